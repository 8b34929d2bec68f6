/**
 * md2html - Markdown to self-contained HTML
 *
 * Rewrites `.md` links to `.html`, embeds local images as base64 data URIs,
 * renders Markdown with micromark (GFM) and wraps it in a Google Fonts template.
 */

export { run } from "./app.js"
export { type ConversionOptions, resolveOptions } from "./config.js"
export {
  type ConversionResult,
  type MarkdownConversion,
  MarkdownToHtmlConverter,
  outputPathFor,
} from "./converter.js"
export { ConversionError, InputReadError, OutputWriteError, UsageError } from "./errors.js"
export { embedImages, type EmbedResult, type UnreadableImage } from "./images.js"
export { classifyTarget, rewriteMarkdownLinks, type TargetKind } from "./links.js"
export { logger } from "./logger.js"
export { mimeTypeFor } from "./mime.js"
export { MarkdownRenderer } from "./renderer.js"
export { createHtmlDocument, type DocumentOptions } from "./template.js"
