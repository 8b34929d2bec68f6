import { mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"
import { MarkdownToHtmlConverter, outputPathFor } from "../src/converter.js"
import { InputReadError, OutputWriteError, UsageError } from "../src/errors.js"

const PNG_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47])

const SAMPLE = `# Project Notes

See the [Guide](./setup.md) or the [Go Doc](https://golang.org/doc/).

![Logo](./logo.png)

![Gone](missing.png)
`

describe("outputPathFor", () => {
  it("swaps the trailing .md for .html", () => {
    expect(outputPathFor("notes.md")).toBe("notes.html")
    expect(outputPathFor("docs/a.md.md")).toBe("docs/a.md.html")
  })

  it("rejects paths without the .md extension", () => {
    expect(() => outputPathFor("notes.txt")).toThrow(UsageError)
    expect(() => outputPathFor("NOTES.MD")).toThrow("Input file must have .md extension")
  })
})

describe("MarkdownToHtmlConverter", () => {
  let dir: string
  const options = { fontFamily: "Open Sans", title: "Notes", highlight: false }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "md2html-convert-"))
    await writeFile(join(dir, "logo.png"), PNG_BYTES)
    await writeFile(join(dir, "doc.md"), SAMPLE)
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it("writes a self-contained document next to the input", async () => {
    const onUnreadable = vi.fn()
    const converter = new MarkdownToHtmlConverter(options, undefined, { onUnreadable })
    const result = await converter.convert(join(dir, "doc.md"))

    expect(result.output).toBe(join(dir, "doc.html"))
    expect(result.imagesEmbedded).toBe(1)
    expect(result.imagesSkipped.map((image) => image.target)).toEqual(["missing.png"])
    expect(onUnreadable).toHaveBeenCalledTimes(1)

    const html = await readFile(join(dir, "doc.html"), "utf-8")
    expect(html).toContain("<title>Notes</title>")
    expect(html).toContain('<h1 id="project-notes">Project Notes</h1>')
    expect(html).toContain('<a href="./setup.html">Guide</a>')
    expect(html).toContain(
      '<a href="https://golang.org/doc/" target="_blank" rel="noopener noreferrer">Go Doc</a>',
    )
    expect(html).toContain('<img src="data:image/png;base64,iVBORw==" alt="Logo" />')
    expect(html).toContain('<img src="missing.png" alt="Gone" />')
  })

  it("writes to an explicit output path", async () => {
    const converter = new MarkdownToHtmlConverter(options)
    const output = join(dir, "site.html")
    const result = await converter.convert(join(dir, "doc.md"), output)
    expect(result.output).toBe(output)
    expect((await readdir(dir)).sort()).toEqual(["doc.md", "logo.png", "site.html"])
  })

  it("produces byte-identical output on repeated runs", async () => {
    const converter = new MarkdownToHtmlConverter(options)
    await converter.convert(join(dir, "doc.md"))
    const first = await readFile(join(dir, "doc.html"))
    await converter.convert(join(dir, "doc.md"))
    const second = await readFile(join(dir, "doc.html"))
    expect(second.equals(first)).toBe(true)
  })

  it("rejects an input without the .md extension before touching the disk", async () => {
    await writeFile(join(dir, "notes.txt"), "# Notes")
    const converter = new MarkdownToHtmlConverter(options)
    await expect(converter.convert(join(dir, "notes.txt"))).rejects.toBeInstanceOf(UsageError)
    await expect(
      converter.convert(join(dir, "notes.txt"), join(dir, "notes.html")),
    ).rejects.toBeInstanceOf(UsageError)
    expect((await readdir(dir)).sort()).toEqual(["doc.md", "logo.png", "notes.txt"])
  })

  it("fails with InputReadError when the input is missing", async () => {
    const converter = new MarkdownToHtmlConverter(options)
    const error = await converter.convert(join(dir, "absent.md")).catch((e: unknown) => e)
    expect(error).toBeInstanceOf(InputReadError)
    expect(String(error)).toContain("failed to read input file: ENOENT")
    expect((await readdir(dir)).sort()).toEqual(["doc.md", "logo.png"])
  })

  it("fails with OutputWriteError when the output cannot be written", async () => {
    const converter = new MarkdownToHtmlConverter(options)
    const output = join(dir, "no-such-dir", "doc.html")
    const error = await converter.convert(join(dir, "doc.md"), output).catch((e: unknown) => e)
    expect(error).toBeInstanceOf(OutputWriteError)
    expect(error instanceof OutputWriteError && error.path).toBe(output)
  })

  it("converts Markdown text with the configured font", async () => {
    const converter = new MarkdownToHtmlConverter({ fontFamily: "Fira Sans", title: "", highlight: false })
    const { html, imagesEmbedded } = await converter.convertMarkdown("![Logo](logo.png)", dir)
    expect(imagesEmbedded).toBe(1)
    expect(html).toContain("family=Fira+Sans:wght@300;400;600;700")
    expect(html).toContain("<title></title>")
    expect(html).toContain("<body>\n<p><img src=\"data:image/png;base64,iVBORw==\" alt=\"Logo\" /></p>\n</body>")
  })
})
