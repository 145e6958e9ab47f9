/**
 * Markdown Renderer for Build Pipeline
 *
 * Renders documentation pages to HTML at build time. Registered fences
 * (freeze, pikchr) become inline SVG fragments; remaining code blocks are
 * highlighted with Shiki.
 */

import { unified } from "unified";
import remarkParse from "remark-parse";
import remarkGfm from "remark-gfm";
import remarkRehype from "remark-rehype";
import rehypeShiki from "@shikijs/rehype";
import rehypeStringify from "rehype-stringify";
import { escapeHtml, parseFenceInfo } from "@docfence/markdown-utils";
import { DEFAULT_FENCES, remarkFences, type RemarkFencesOptions } from "./remark-fences.js";

export type RenderMarkdownOptions = RemarkFencesOptions;

/**
 * Markdown processor with Shiki for pages with ordinary code blocks.
 */
function getProcessor(options: RenderMarkdownOptions) {
  return unified()
    .use(remarkParse)
    .use(remarkGfm)
    .use(remarkFences, options)
    .use(remarkRehype, { allowDangerousHtml: true })
    .use(rehypeShiki, {
      themes: {
        light: "github-light",
        dark: "github-dark",
      },
    })
    .use(rehypeStringify, { allowDangerousHtml: true });
}

/**
 * Simple processor without Shiki for content that doesn't need syntax highlighting.
 */
function getSimpleProcessor(options: RenderMarkdownOptions) {
  return unified()
    .use(remarkParse)
    .use(remarkGfm)
    .use(remarkFences, options)
    .use(remarkRehype, { allowDangerousHtml: true })
    .use(rehypeStringify, { allowDangerousHtml: true });
}

/**
 * Check if content has code blocks that need syntax highlighting, i.e. fenced
 * blocks other than the rendered fences.
 */
export function hasHighlightableCode(content: string, fenceNames: Iterable<string>): boolean {
  const rendered = new Set(fenceNames);
  let openFence: string | null = null;

  for (const line of content.split("\n")) {
    const match = /^ {0,3}(`{3,}|~{3,})(.*)$/.exec(line);
    if (!match) continue;
    const [, marker, info] = match;

    if (openFence) {
      // Closing fence: same character, at least as long, no info string
      if (marker[0] === openFence[0] && marker.length >= openFence.length && !info.trim()) {
        openFence = null;
      }
      continue;
    }

    openFence = marker;
    if (!rendered.has(parseFenceInfo(info).name ?? "")) {
      return true;
    }
  }
  return false;
}

/**
 * Render markdown content to HTML.
 *
 * Uses Shiki for syntax highlighting if ordinary code blocks are present,
 * otherwise uses a simpler/faster processor.
 *
 * @param content - Raw markdown content
 * @returns HTML string
 */
export async function renderMarkdown(
  content: string,
  options: RenderMarkdownOptions = {},
): Promise<string> {
  if (!content || !content.trim()) {
    return "";
  }

  const fenceNames = Object.keys(options.fences ?? DEFAULT_FENCES);
  const needsShiki = hasHighlightableCode(content, fenceNames);

  try {
    const processor = needsShiki ? getProcessor(options) : getSimpleProcessor(options);
    const result = await processor.process(content);
    return String(result);
  } catch (error) {
    console.error("[markdown-renderer] Error rendering markdown:", error);
    // Fallback: return escaped content
    return `<p>${escapeHtml(content)}</p>`;
  }
}
