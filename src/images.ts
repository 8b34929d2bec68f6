/**
 * Image embedding.
 * Replaces local image references in Markdown with base64 data URIs so the
 * rendered document carries its images inline.
 */

import { readFile } from "node:fs/promises"
import { join } from "node:path"
import { describeError } from "./errors.js"
import { classifyTarget } from "./links.js"
import { logger } from "./logger.js"
import { mimeTypeFor } from "./mime.js"

const IMAGE_PATTERN = /!\[([^\]]*)\]\(([^)]+)\)/g

/**
 * An image reference that could not be read and was kept as written.
 */
export interface UnreadableImage {
  /** Target as written in the document */
  target: string
  /** Path the target resolved to */
  path: string
  error: string
}

export interface EmbedOptions {
  /**
   * Called for every unreadable image. Defaults to a logger warning.
   */
  onUnreadable?: (image: UnreadableImage) => void
}

export interface EmbedResult {
  markdown: string
  /** Number of references replaced by data URIs */
  embedded: number
  skipped: UnreadableImage[]
}

export interface ImageMatch {
  start: number
  end: number
  alt: string
  target: string
}

function warnUnreadable({ target, path, error }: UnreadableImage): void {
  logger.warn({ image: target, path, error }, `Warning: Could not read image ${target}: ${error}`)
}

/**
 * Builds a `data:` URI for the given bytes.
 */
export function toDataUri(bytes: Uint8Array, mimeType: string): string {
  return `data:${mimeType};base64,${Buffer.from(bytes).toString("base64")}`
}

/**
 * Finds every `![alt](target)` reference in document order.
 */
export function findImages(markdown: string): ImageMatch[] {
  const images: ImageMatch[] = []
  for (const match of markdown.matchAll(IMAGE_PATTERN)) {
    const start = match.index ?? 0
    images.push({
      start,
      end: start + match[0].length,
      alt: match[1],
      target: match[2],
    })
  }
  return images
}

/**
 * Embeds local images referenced by a Markdown document.
 *
 * Targets are joined onto `baseDir` (the directory of the source document).
 * URLs and existing data URIs are left untouched. An image that cannot be read
 * keeps its original reference and is reported, and conversion continues.
 *
 * @param markdown - Markdown source
 * @param baseDir - Directory that relative image paths are resolved against
 * @returns Rewritten Markdown with counts of embedded and skipped images
 */
export async function embedImages(
  markdown: string,
  baseDir: string,
  options: EmbedOptions = {},
): Promise<EmbedResult> {
  const onUnreadable = options.onUnreadable ?? warnUnreadable
  // Each resolved path is read once per call: a data URI, or the read error
  const reads = new Map<string, { dataUri: string } | { error: string }>()
  const skipped: UnreadableImage[] = []
  let embedded = 0
  let result = ""
  let cursor = 0

  for (const image of findImages(markdown)) {
    result += markdown.slice(cursor, image.start)
    cursor = image.end
    const original = markdown.slice(image.start, image.end)

    const kind = classifyTarget(image.target)
    if (kind === "absolute-url" || kind === "data-uri") {
      result += original
      continue
    }

    const path = join(baseDir, image.target)
    let read = reads.get(path)
    if (!read) {
      try {
        const bytes = await readFile(path)
        read = { dataUri: toDataUri(bytes, mimeTypeFor(image.target)) }
        logger.debug({ image: image.target, path, bytes: bytes.length }, "Embedded image")
      } catch (error) {
        read = { error: describeError(error) }
      }
      reads.set(path, read)
    }

    if ("error" in read) {
      const unreadable: UnreadableImage = { target: image.target, path, error: read.error }
      skipped.push(unreadable)
      onUnreadable(unreadable)
      result += original
      continue
    }

    embedded++
    result += `![${image.alt}](${read.dataUri})`
  }

  result += markdown.slice(cursor)
  return { markdown: result, embedded, skipped }
}
