#!/usr/bin/env node
/**
 * Render Docs Command
 *
 * Renders Markdown pages to HTML, turning freeze and pikchr fences into
 * inline SVG.
 *
 * Usage:
 *   render-docs <files...> --out <dir> [--freeze-bin <path>] [--pikchr-bin <path>] [--timeout <ms>]
 *
 * Example:
 *   render-docs doc/src/guide/*.md --out site/guide
 */

import { Command } from "commander";
import { renderDocsFiles } from "../docs-renderer.js";
import { addRendererOptions, resolveRendererConfig, type RendererCliOptions } from "../cli-options.js";

interface RenderDocsCliOptions extends RendererCliOptions {
  out: string;
  verbose?: boolean;
}

async function main(): Promise<void> {
  const program = new Command();

  addRendererOptions(
    program
      .name("render-docs")
      .description("Render Markdown pages to HTML with freeze and pikchr fences")
      .argument("<files...>", "Markdown files to render")
      .requiredOption("--out <dir>", "Output directory for the HTML files")
      .option("-v, --verbose", "Enable verbose output", false),
  ).action(async (files: string[], options: RenderDocsCliOptions) => {
    const config = resolveRendererConfig(options);

    console.log(`\n🖼️  Rendering ${files.length} page(s) to ${options.out}`);
    if (options.verbose) {
      console.log(`   freeze: ${config.freezeBin}`);
      console.log(`   pikchr: ${config.pikchrBin}`);
      console.log(`   timeout: ${config.timeoutMs / 1000}s`);
    }

    const pages = await renderDocsFiles(files, {
      outDir: options.out,
      verbose: options.verbose,
      config,
    });

    const totalSize = pages.reduce((sum, page) => sum + page.bytes, 0);
    console.log(`\n✅ Rendered ${pages.length} page(s)`);
    console.log(`   Total size: ${(totalSize / 1024).toFixed(1)} KB`);
  });

  await program.parseAsync(process.argv);
}

main().catch((error) => {
  console.error("❌ Rendering failed:", error);
  process.exit(1);
});

export { main as renderDocsMain };
