/**
 * Conversion options with their defaults.
 * CLI values win over environment variables, which win over built-in defaults.
 */

export const DEFAULT_FONT_FAMILY = "Open Sans"
export const DEFAULT_TITLE = ""

export interface ConversionOptions {
  fontFamily: string
  title: string
  /** Syntax-highlight fenced code blocks */
  highlight: boolean
}

/**
 * Fills in unset options from `MD2HTML_FONT`, `MD2HTML_TITLE` and the defaults.
 */
export function resolveOptions(
  options: Partial<ConversionOptions> = {},
  env: NodeJS.ProcessEnv = process.env,
): ConversionOptions {
  return {
    fontFamily: options.fontFamily ?? env.MD2HTML_FONT ?? DEFAULT_FONT_FAMILY,
    title: options.title ?? env.MD2HTML_TITLE ?? DEFAULT_TITLE,
    highlight: options.highlight ?? true,
  }
}
