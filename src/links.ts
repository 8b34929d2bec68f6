/**
 * Markdown link rewriting.
 * Turns relative links to sibling Markdown files into links to their HTML output.
 */

/**
 * How a link or image target is treated by the rewriting passes.
 */
export type TargetKind = "absolute-url" | "anchor" | "data-uri" | "local-path"

/**
 * Matches `[text](target)` with an optional leading `!`, which marks an image.
 */
const REFERENCE_PATTERN = /(!?)\[([^\]]*)\]\(([^)]+)\)/g

const MARKDOWN_SUFFIX = ".md"
const HTML_SUFFIX = ".html"

/**
 * Classifies a target by its prefix.
 */
export function classifyTarget(target: string): TargetKind {
  if (target.startsWith("http://") || target.startsWith("https://")) {
    return "absolute-url"
  }
  if (target.startsWith("#")) {
    return "anchor"
  }
  if (target.startsWith("data:")) {
    return "data-uri"
  }
  return "local-path"
}

/**
 * Rewrites a single link target: `guide.md` becomes `guide.html`.
 * Absolute URLs, anchors and non-Markdown targets come back unchanged.
 */
export function rewriteLinkTarget(target: string): string {
  const kind = classifyTarget(target)
  if (kind === "absolute-url" || kind === "anchor") {
    return target
  }
  if (!target.endsWith(MARKDOWN_SUFFIX)) {
    return target
  }
  return target.slice(0, -MARKDOWN_SUFFIX.length) + HTML_SUFFIX
}

/**
 * Rewrites every local `.md` link target in a Markdown document to `.html`.
 *
 * Images (`![alt](src)`) are left alone. Code spans and fenced blocks get no
 * special treatment, so links written inside them are rewritten as well.
 */
export function rewriteMarkdownLinks(markdown: string): string {
  return markdown.replace(
    REFERENCE_PATTERN,
    (match: string, bang: string, text: string, target: string) => {
      if (bang) {
        return match
      }
      const rewritten = rewriteLinkTarget(target)
      return rewritten === target ? match : `[${text}](${rewritten})`
    },
  )
}
