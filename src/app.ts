/**
 * Command-line application for md2html.
 * Parses arguments, runs one conversion and reports the outcome.
 */

import yargs from "yargs"
import { DEFAULT_FONT_FAMILY, DEFAULT_TITLE } from "./config.js"
import { MarkdownToHtmlConverter, assertMarkdownPath } from "./converter.js"
import { UsageError, describeError } from "./errors.js"
import { logger } from "./logger.js"

export const VERSION = "1.0.0"

/**
 * Runs the CLI against the given arguments (without the node and script entries).
 *
 * @returns Process exit code: 0 on success, 1 on any failure
 */
export async function run(args: string[]): Promise<number> {
  let exitCode = 0
  let missingInput = false

  const parser = yargs(args)
    .scriptName("md2html")
    .command(
      "$0 [input]",
      "Convert a Markdown file to a self-contained HTML document",
      (yargs) => {
        return yargs
          .positional("input", {
            describe: "Input Markdown file (must end with .md)",
            type: "string",
          })
          .option("font", {
            describe: `Google Font family to use (default: $MD2HTML_FONT or "${DEFAULT_FONT_FAMILY}")`,
            type: "string",
          })
          .option("title", {
            describe: `HTML document title (default: $MD2HTML_TITLE or "${DEFAULT_TITLE}")`,
            type: "string",
          })
          .option("output", {
            alias: "o",
            describe: "Output HTML file path (default: input path with .md replaced by .html)",
            type: "string",
          })
          .option("highlight", {
            describe: "Syntax-highlight fenced code blocks (--no-highlight to disable)",
            type: "boolean",
            default: true,
          })
      },
      async (argv) => {
        if (argv.input === undefined || argv.input === "") {
          missingInput = true
          return
        }

        const input = String(argv.input)
        try {
          assertMarkdownPath(input)
          const converter = new MarkdownToHtmlConverter({
            fontFamily: argv.font,
            title: argv.title,
            highlight: argv.highlight,
          })
          const { output, imagesEmbedded, imagesSkipped } = await converter.convert(
            input,
            argv.output,
          )
          logger.info(
            { input, output, imagesEmbedded, imagesSkipped: imagesSkipped.length },
            `Successfully converted ${input} to ${output}`,
          )
        } catch (error) {
          const errorMessage = describeError(error)
          logger.error({ input, error: errorMessage }, `Error: ${errorMessage}`)
          exitCode = 1
        }
      },
    )
    .example("$0 file.md", "Write file.html next to file.md")
    .example("$0 --font 'Roboto' file.md", "Use the Roboto Google Font")
    .example("$0 --title 'My Document' file.md", "Set the document title")
    .version(VERSION)
    .help()
    .alias("help", "h")
    .alias("version", "v")
    .strictOptions()
    .exitProcess(false)
    .fail((message, error) => {
      throw error ?? new UsageError(message)
    })

  try {
    await parser.parseAsync()
  } catch (error) {
    logger.error({ error: describeError(error) }, `Error: ${describeError(error)}`)
    return 1
  }

  if (missingInput) {
    parser.showHelp("log")
    return 1
  }
  return exitCode
}
