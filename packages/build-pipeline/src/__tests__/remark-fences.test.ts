import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { unified } from "unified";
import remarkParse from "remark-parse";
import remarkRehype from "remark-rehype";
import rehypeStringify from "rehype-stringify";
import type { Code } from "mdast";
import { VISUALLY_HIDDEN_STYLE } from "@docfence/fence-render";
import { fenceRequestFor, remarkFences, type RemarkFencesOptions } from "../remark-fences.js";
import { echoRenderer } from "./helpers.js";

function code(lang: string | null, meta: string | null, value: string): Code {
  return { type: "code", lang, meta, value };
}

async function render(markdown: string, options: RemarkFencesOptions): Promise<string> {
  const file = await unified()
    .use(remarkParse)
    .use(remarkFences, options)
    .use(remarkRehype, { allowDangerousHtml: true })
    .use(rehypeStringify, { allowDangerousHtml: true })
    .process(markdown);
  return String(file);
}

describe("fenceRequestFor", () => {
  it("should build a request for a registered fence", () => {
    const request = fenceRequestFor(code("freeze", '{language="go" width="50%"}', "x := 1"));
    expect(request).toEqual({
      kind: "code-image",
      declaredLanguage: "freeze",
      rawAttributes: new Map([
        ["language", "go"],
        ["width", "50%"],
      ]),
      body: "x := 1",
    });
  });

  it("should map pikchr to a diagram", () => {
    expect(fenceRequestFor(code("pikchr", null, "box"))?.kind).toBe("diagram");
  });

  it("should ignore ordinary code blocks", () => {
    expect(fenceRequestFor(code("js", null, "let a"))).toBeNull();
    expect(fenceRequestFor(code(null, null, "plain"))).toBeNull();
  });

  it("should accept the brace-only info form", () => {
    const request = fenceRequestFor(code('{.pikchr', 'float="left"}', "box"));
    expect(request?.kind).toBe("diagram");
    expect([...(request?.rawAttributes ?? [])]).toEqual([["float", "left"]]);
  });

  it("should use a custom fence table", () => {
    const fences = { chart: "diagram" } as const;
    expect(fenceRequestFor(code("chart", null, "box"), fences)?.kind).toBe("diagram");
    expect(fenceRequestFor(code("pikchr", null, "box"), fences)).toBeNull();
  });
});

describe("remarkFences", () => {
  let warn: MockInstance<typeof console.warn>;

  beforeEach(() => {
    warn = vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    warn.mockRestore();
  });

  it("should replace a diagram fence with its fragment", async () => {
    const diagram = echoRenderer("diagram", "pikchr");

    const html = await render("# Title\n\n```pikchr\nbox\n```\n", { renderers: { diagram } });

    expect(html).toContain("<h1>Title</h1>");
    expect(html).toContain(
      '<div class="pikchr" style="width:40px;height:20px;max-width:100%;margin:0 auto;">' +
        '<svg viewBox="0 0 40 20"><text>box</text></svg></div>',
    );
    expect(html).not.toContain("<pre><code");
  });

  it("should render a code image with its attributes and hidden text", async () => {
    const codeImage = echoRenderer("code-image", "freeze");

    const html = await render('```freeze {language="go" width="60%" float="right"}\nx := 1\n```\n', {
      renderers: { "code-image": codeImage },
    });

    expect(codeImage.calls).toHaveLength(1);
    expect(codeImage.calls[0].options.language).toBe("go");
    expect(codeImage.calls[0].source).toBe("x := 1");
    expect(html).toContain(
      '<div class="freeze" style="width:60%;height:auto;max-width:100%;float:right;">' +
        '<svg aria-hidden="true" focusable="false" viewBox="0 0 40 20"><text>x := 1</text></svg>' +
        `<pre class="sr-only" style="${VISUALLY_HIDDEN_STYLE}">x := 1</pre></div>`,
    );
  });

  it("should leave ordinary code blocks alone", async () => {
    const diagram = echoRenderer("diagram", "pikchr");

    const html = await render("```js\nconst a = 1;\n```\n", { renderers: { diagram } });

    expect(diagram.calls).toHaveLength(0);
    expect(html).toContain('<code class="language-js">const a = 1;');
  });

  it("should keep fences in document order", async () => {
    const diagram = echoRenderer("diagram", "pikchr");
    const markdown = ["one", "two", "three", "four", "five"]
      .map((word) => `\`\`\`pikchr\n${word}\n\`\`\`\n`)
      .join("\n");

    const html = await render(markdown, { renderers: { diagram }, concurrency: 2 });

    const positions = ["one", "two", "three", "four", "five"].map((word) =>
      html.indexOf(`<text>${word}</text>`),
    );
    expect(positions.every((position) => position >= 0)).toBe(true);
    expect([...positions].sort((a, b) => a - b)).toEqual(positions);
  });

  it("should still render every fence with a concurrency of zero", async () => {
    const diagram = echoRenderer("diagram", "pikchr");

    const html = await render("```pikchr\nleft\n```\n\n```pikchr\nright\n```\n", {
      renderers: { diagram },
      concurrency: 0,
    });

    expect(diagram.calls.map((call) => call.source)).toEqual(["left", "right"]);
    expect(html).toContain("<text>right</text>");
  });

  it("should render fences nested in a list", async () => {
    const diagram = echoRenderer("diagram", "pikchr");

    const html = await render("- item\n\n  ```pikchr\n  box\n  ```\n", { renderers: { diagram } });

    expect(html).toContain("<li>");
    expect(html).toContain('<svg viewBox="0 0 40 20"><text>box</text></svg>');
  });

  it("should put a diagnostic in place of an invalid block", async () => {
    const codeImage = echoRenderer("code-image", "freeze");

    const html = await render("before\n\n```freeze\nx\n```\n\nafter\n", {
      renderers: { "code-image": codeImage },
    });

    expect(codeImage.calls).toHaveLength(0);
    expect(html).toContain(
      '<code class="fence-error">missing required option &quot;language&quot;</code>',
    );
    expect(html).toContain("<p>before</p>");
    expect(html).toContain("<p>after</p>");
    expect(warn).toHaveBeenCalledWith(
      '[fence-render] code-image block failed (validation): missing required option "language"',
    );
  });
});
