/**
 * Renders Markdown pages to HTML files.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { renderMarkdown, type RenderMarkdownOptions } from "./markdown-renderer.js";

export interface RenderDocsOptions extends RenderMarkdownOptions {
  /** Directory the HTML files are written to */
  outDir: string;
  /** Log each page as it is written */
  verbose?: boolean;
}

export interface RenderedPage {
  source: string;
  output: string;
  bytes: number;
}

/**
 * Output path for a page: its base name with an .html extension.
 */
export function outputPathFor(file: string, outDir: string): string {
  const { name } = path.parse(file);
  return path.join(outDir, `${name}.html`);
}

/**
 * Render each Markdown file and write the HTML next to the others in `outDir`.
 * Pages are rendered one after another; fences within a page render concurrently.
 */
export async function renderDocsFiles(
  files: readonly string[],
  options: RenderDocsOptions,
): Promise<RenderedPage[]> {
  const { outDir, verbose, ...renderOptions } = options;
  await mkdir(outDir, { recursive: true });

  const pages: RenderedPage[] = [];
  for (const file of files) {
    const content = await readFile(file, "utf-8");
    const html = await renderMarkdown(content, renderOptions);
    const output = outputPathFor(file, outDir);
    await writeFile(output, html, "utf-8");

    const bytes = Buffer.byteLength(html, "utf-8");
    if (verbose) {
      console.log(`   📄 ${file} → ${output} (${(bytes / 1024).toFixed(1)} KB)`);
    }
    pages.push({ source: file, output, bytes });
  }

  return pages;
}
