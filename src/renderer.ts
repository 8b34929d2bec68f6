/**
 * Markdown rendering module.
 * Renders Markdown to an HTML fragment with micromark (GFM), then adds heading
 * anchors, opens non-relative links in a new tab and highlights fenced code with Shiki.
 */

import GithubSlugger from "github-slugger"
import { micromark } from "micromark"
import { gfm, gfmHtml } from "micromark-extension-gfm"
import { type BundledLanguage, createHighlighter, type Highlighter } from "shiki/bundle/full"
import { describeError } from "./errors.js"
import { logger } from "./logger.js"

const SHIKI_THEME = "github-light" as const

/**
 * Languages loaded into the highlighter.
 */
const SUPPORTED_LANGUAGES: BundledLanguage[] = [
  "typescript",
  "tsx",
  "javascript",
  "jsx",
  "json",
  "markdown",
  "yaml",
  "toml",
  "bash",
  "shell",
  "python",
  "go",
  "rust",
  "java",
  "c",
  "cpp",
  "csharp",
  "ruby",
  "html",
  "css",
  "sql",
  "xml",
  "diff",
  "dockerfile",
]

const HEADING_PATTERN = /<h([1-6])>([\s\S]*?)<\/h\1>/g
const LINK_PATTERN = /<a href="([^"]*)"([^>]*)>/g
const TARGET_ATTRIBUTE_PATTERN = /\starget=/i
const CODE_BLOCK_PATTERN = /<pre><code class="language-([\w+#-]+)">([\s\S]*?)<\/code><\/pre>/g

export interface RenderOptions {
  /** Syntax-highlight fenced code blocks (default: true) */
  highlight?: boolean
}

/**
 * Decodes the entities micromark emits.
 */
function decodeHtmlEntities(encoded: string): string {
  return encoded
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&amp;/g, "&")
}

/**
 * Gives every heading a GitHub-style `id`, unique within the fragment.
 */
export function addHeadingIds(html: string): string {
  const slugger = new GithubSlugger()
  return html.replace(HEADING_PATTERN, (_match: string, level: string, inner: string) => {
    const text = decodeHtmlEntities(inner.replace(/<[^>]*>/g, ""))
    return `<h${level} id="${slugger.slug(text)}">${inner}</h${level}>`
  })
}

/**
 * Relative links stay in the current tab: `#anchor`, `/root-path`, `./x` and `../x`.
 * Everything else, bare file names and `mailto:` included, counts as leaving the page.
 */
export function isRelativeLink(href: string): boolean {
  return (
    href === "" ||
    href.startsWith("#") ||
    (href.startsWith("/") && !href.startsWith("//")) ||
    href.startsWith("./") ||
    href.startsWith("../")
  )
}

/**
 * Makes non-relative links open in a new browsing context.
 * Anchors that already name a target keep it.
 */
export function addLinkTargets(html: string): string {
  return html.replace(LINK_PATTERN, (anchor: string, href: string, attributes: string) => {
    if (isRelativeLink(href) || TARGET_ATTRIBUTE_PATTERN.test(attributes)) {
      return anchor
    }
    return `<a href="${href}" target="_blank" rel="noopener noreferrer"${attributes}>`
  })
}

/**
 * Renders Markdown to HTML fragments.
 * The Shiki highlighter is created on first use and reused afterwards.
 */
export class MarkdownRenderer {
  private highlighter: Promise<Highlighter> | null = null

  /**
   * Returns the Shiki highlighter instance (lazy initialization).
   *
   * @throws {Error} If initialization fails
   */
  private getHighlighter(): Promise<Highlighter> {
    if (!this.highlighter) {
      logger.debug(
        { theme: SHIKI_THEME, languages: SUPPORTED_LANGUAGES.length },
        "Initializing Shiki highlighter",
      )
      this.highlighter = createHighlighter({
        themes: [SHIKI_THEME],
        langs: SUPPORTED_LANGUAGES,
      }).catch((error: unknown) => {
        this.highlighter = null
        throw new Error(`Failed to initialize Shiki highlighter: ${describeError(error)}`, {
          cause: error,
        })
      })
    }
    return this.highlighter
  }

  /**
   * Applies syntax highlighting to fenced code blocks that name a language.
   * Blocks in a language the highlighter does not know stay as plain code.
   */
  async highlightCodeBlocks(html: string): Promise<string> {
    if (!html.match(CODE_BLOCK_PATTERN)) {
      return html
    }

    const highlighter = await this.getHighlighter()
    let highlighted = 0
    let plain = 0

    const result = html.replace(
      CODE_BLOCK_PATTERN,
      (block: string, language: string, encodedCode: string) => {
        const lang = language.toLowerCase()
        try {
          const code = decodeHtmlEntities(encodedCode).replace(/\n$/, "")
          const output = highlighter.codeToHtml(code, { lang, theme: SHIKI_THEME })
          highlighted++
          return output
        } catch (error) {
          logger.debug(
            { language: lang, error: describeError(error) },
            "Failed to highlight code block, using plain code",
          )
          plain++
          return block
        }
      },
    )

    logger.debug({ highlighted, plain }, "Code block highlighting completed")
    return result
  }

  /**
   * Renders Markdown to an HTML fragment.
   *
   * Raw HTML and any URL scheme pass through: the input is the operator's own
   * document, and embedded images are `data:` URIs.
   */
  async render(markdown: string, options: RenderOptions = {}): Promise<string> {
    let html = micromark(markdown, {
      allowDangerousHtml: true,
      allowDangerousProtocol: true,
      extensions: [gfm()],
      htmlExtensions: [gfmHtml()],
    })

    html = addHeadingIds(html)
    html = addLinkTargets(html)

    if (options.highlight ?? true) {
      html = await this.highlightCodeBlocks(html)
    }
    return html
  }
}
