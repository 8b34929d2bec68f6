/**
 * Markdown to HTML converter module.
 * Converts a Markdown file into a self-contained HTML document: `.md` links point
 * at their `.html` outputs and local images are embedded as data URIs.
 */

import { readFile, writeFile } from "node:fs/promises"
import { dirname } from "node:path"
import { type ConversionOptions, resolveOptions } from "./config.js"
import { InputReadError, OutputWriteError, UsageError } from "./errors.js"
import { type EmbedOptions, embedImages, type UnreadableImage } from "./images.js"
import { rewriteMarkdownLinks } from "./links.js"
import { logger } from "./logger.js"
import { MarkdownRenderer } from "./renderer.js"
import { createHtmlDocument } from "./template.js"

const MARKDOWN_EXTENSION = ".md"
const HTML_EXTENSION = ".html"

/**
 * Outcome of converting one file.
 */
export interface ConversionResult {
  input: string
  output: string
  imagesEmbedded: number
  imagesSkipped: UnreadableImage[]
}

export interface MarkdownConversion {
  html: string
  imagesEmbedded: number
  imagesSkipped: UnreadableImage[]
}

/**
 * Derives the output path: the trailing `.md` becomes `.html`.
 *
 * @throws {UsageError} If the path does not end with `.md`
 */
export function outputPathFor(inputFile: string): string {
  assertMarkdownPath(inputFile)
  return inputFile.slice(0, -MARKDOWN_EXTENSION.length) + HTML_EXTENSION
}

/**
 * @throws {UsageError} If the path does not end with `.md` (case-sensitive)
 */
export function assertMarkdownPath(inputFile: string): void {
  if (!inputFile.endsWith(MARKDOWN_EXTENSION)) {
    throw new UsageError("Input file must have .md extension")
  }
}

/**
 * Converts Markdown files to standalone HTML documents.
 */
export class MarkdownToHtmlConverter {
  private readonly renderer: MarkdownRenderer
  private readonly options: ConversionOptions
  private readonly embedOptions: EmbedOptions

  constructor(
    options: Partial<ConversionOptions> = {},
    renderer: MarkdownRenderer = new MarkdownRenderer(),
    embedOptions: EmbedOptions = {},
  ) {
    this.options = resolveOptions(options)
    this.renderer = renderer
    this.embedOptions = embedOptions
  }

  /**
   * Runs the pipeline on Markdown text: rewrite links, embed images, render, wrap.
   *
   * @param markdownContent - Markdown source
   * @param baseDir - Directory that relative image paths are resolved against
   */
  async convertMarkdown(markdownContent: string, baseDir: string): Promise<MarkdownConversion> {
    const linked = rewriteMarkdownLinks(markdownContent)
    const { markdown, embedded, skipped } = await embedImages(linked, baseDir, this.embedOptions)
    logger.debug({ embedded, skipped: skipped.length }, "Processed images")

    const fragment = await this.renderer.render(markdown, { highlight: this.options.highlight })
    const html = createHtmlDocument(fragment, {
      fontFamily: this.options.fontFamily,
      title: this.options.title,
    })

    return { html, imagesEmbedded: embedded, imagesSkipped: skipped }
  }

  /**
   * Converts a Markdown file to HTML.
   * The output file is written once, after every other step has succeeded.
   *
   * @param markdownFile - Input Markdown file path, must end with `.md`
   * @param outputFile - Output HTML file path (defaults to input with .html extension)
   * @throws {UsageError} If the input does not end with `.md`
   * @throws {InputReadError} If the input cannot be read
   * @throws {OutputWriteError} If the output cannot be written
   */
  async convert(markdownFile: string, outputFile?: string): Promise<ConversionResult> {
    const output = outputFile ?? outputPathFor(markdownFile)
    assertMarkdownPath(markdownFile)

    let markdownContent: string
    try {
      markdownContent = await readFile(markdownFile, "utf-8")
    } catch (error) {
      throw new InputReadError(markdownFile, error)
    }

    const { html, imagesEmbedded, imagesSkipped } = await this.convertMarkdown(
      markdownContent,
      dirname(markdownFile),
    )

    try {
      await writeFile(output, html, "utf-8")
    } catch (error) {
      throw new OutputWriteError(output, error)
    }

    logger.debug(
      { input: markdownFile, output, imagesEmbedded, imagesSkipped: imagesSkipped.length },
      "Wrote HTML document",
    )

    return { input: markdownFile, output, imagesEmbedded, imagesSkipped }
  }
}
