import { describe, it, expect } from "vitest";
import { parseFenceAttributes, parseFenceInfo } from "../fence-attributes.js";
import { escapeHtml } from "../html.js";

describe("parseFenceAttributes", () => {
  it("should parse quoted attributes in braces", () => {
    const attrs = parseFenceAttributes('{language="go" width="50%"}');
    expect([...attrs]).toEqual([
      ["language", "go"],
      ["width", "50%"],
    ]);
  });

  it("should parse bare and single-quoted values without braces", () => {
    const attrs = parseFenceAttributes("float=right title='Two words' center=false");
    expect([...attrs]).toEqual([
      ["float", "right"],
      ["title", "Two words"],
      ["center", "false"],
    ]);
  });

  it("should keep spaces inside quoted values", () => {
    expect(parseFenceAttributes('{title="a  b c"}').get("title")).toBe("a  b c");
  });

  it("should allow spaces around the equals sign", () => {
    expect(parseFenceAttributes('{width = "10em"}').get("width")).toBe("10em");
  });

  it("should ignore classes, ids and stray words", () => {
    const attrs = parseFenceAttributes('{.freeze #intro linenums language="terminal"}');
    expect([...attrs]).toEqual([["language", "terminal"]]);
  });

  it("should let a later duplicate win", () => {
    expect(parseFenceAttributes("width=1 width=2").get("width")).toBe("2");
  });

  it("should return an empty map for missing meta", () => {
    expect(parseFenceAttributes(null).size).toBe(0);
    expect(parseFenceAttributes(undefined).size).toBe(0);
    expect(parseFenceAttributes("").size).toBe(0);
  });
});

describe("parseFenceInfo", () => {
  it("should split a language and its attributes", () => {
    const info = parseFenceInfo('freeze {language="go"}');
    expect(info.name).toBe("freeze");
    expect([...info.attributes]).toEqual([["language", "go"]]);
  });

  it("should take the first class as the name in brace form", () => {
    const info = parseFenceInfo('{.pikchr .wide float="left"}');
    expect(info.name).toBe("pikchr");
    expect([...info.attributes]).toEqual([["float", "left"]]);
  });

  it("should handle a bare language", () => {
    expect(parseFenceInfo("pikchr")).toEqual({ name: "pikchr", attributes: new Map() });
  });

  it("should handle an empty info string", () => {
    expect(parseFenceInfo("   ")).toEqual({ attributes: new Map() });
  });
});

describe("escapeHtml", () => {
  it("should escape markup characters", () => {
    expect(escapeHtml(`<a href="x">Tom & 'Jerry'</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;Tom &amp; &#039;Jerry&#039;&lt;/a&gt;",
    );
  });
});
