import { describe, expect, it } from "vitest"
import { createHtmlDocument, googleFontQuery } from "../src/template.js"

describe("googleFontQuery", () => {
  it("replaces spaces with plus signs", () => {
    expect(googleFontQuery("Open Sans")).toBe("Open+Sans")
    expect(googleFontQuery("Source Sans Pro")).toBe("Source+Sans+Pro")
    expect(googleFontQuery("Roboto")).toBe("Roboto")
  })
})

describe("createHtmlDocument", () => {
  const html = createHtmlDocument("<p>Hello</p>", { fontFamily: "Open Sans", title: "My Doc" })

  it("produces a complete document", () => {
    expect(html.startsWith('<!DOCTYPE html>\n<html lang="en">\n<head>')).toBe(true)
    expect(html.endsWith("</html>")).toBe(true)
  })

  it("sets the title", () => {
    expect(html).toContain("    <title>My Doc</title>\n")
  })

  it("links the Google Font stylesheet", () => {
    expect(html).toContain(
      '<link href="https://fonts.googleapis.com/css2?family=Open+Sans:wght@300;400;600;700&display=swap" rel="stylesheet">',
    )
    expect(html).toContain("font-family: 'Open Sans', sans-serif;")
  })

  it("places the fragment verbatim in the body", () => {
    expect(html).toContain("<body>\n<p>Hello</p>\n</body>")
  })

  it("allows an empty title", () => {
    const doc = createHtmlDocument("", { fontFamily: "Roboto", title: "" })
    expect(doc).toContain("<title></title>")
    expect(doc).toContain("family=Roboto:wght@300;400;600;700")
  })

  it("substitutes title and font without escaping", () => {
    const doc = createHtmlDocument("", { fontFamily: "A&B", title: "<b>Bold</b>" })
    expect(doc).toContain("<title><b>Bold</b></title>")
    expect(doc).toContain("family=A&B:wght")
  })
})
