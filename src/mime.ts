import { extname } from "node:path"

export const DEFAULT_IMAGE_MIME_TYPE = "image/png"

const IMAGE_MIME_TYPES: Readonly<Record<string, string>> = {
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".png": "image/png",
  ".gif": "image/gif",
  ".bmp": "image/bmp",
  ".webp": "image/webp",
  ".svg": "image/svg+xml",
  ".ico": "image/x-icon",
}

/**
 * Returns the image MIME type for a path, judged by its extension (case-insensitive).
 * Unknown extensions fall back to image/png.
 */
export function mimeTypeFor(path: string): string {
  const ext = extname(path).toLowerCase()
  return Object.hasOwn(IMAGE_MIME_TYPES, ext) ? IMAGE_MIME_TYPES[ext] : DEFAULT_IMAGE_MIME_TYPE
}
