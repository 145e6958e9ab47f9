#!/usr/bin/env node
/**
 * Render Fence Command
 *
 * Renders a single fence body read from stdin and prints the HTML fragment.
 * Handy for checking how a block will look before putting it in a page.
 *
 * Usage:
 *   render-fence <freeze|pikchr> [-a key=value ...] [--strict] < body.txt
 *
 * Example:
 *   echo '{green}ok{reset}' | render-fence freeze -a language=terminal -a width=50%
 */

import { Command, InvalidArgumentError } from "commander";
import { renderFence } from "@docfence/fence-render";
import { addRendererOptions, collectAttribute, resolveRendererConfig, type RendererCliOptions } from "../cli-options.js";
import { DEFAULT_FENCES } from "../remark-fences.js";

interface RenderFenceCliOptions extends RendererCliOptions {
  attr: Map<string, string>;
  strict?: boolean;
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf-8");
}

async function main(): Promise<void> {
  const program = new Command();

  addRendererOptions(
    program
      .name("render-fence")
      .description("Render one freeze or pikchr block from stdin to an HTML fragment")
      .argument("<fence>", `Fence name (${Object.keys(DEFAULT_FENCES).join(", ")})`)
      .option("-a, --attr <key=value>", "Fence attribute (repeatable)", collectAttribute, new Map<string, string>())
      .option("--strict", "Exit with code 2 when the block renders as a diagnostic", false),
  ).action(async (fence: string, options: RenderFenceCliOptions) => {
    const kind = new Map(Object.entries(DEFAULT_FENCES)).get(fence);
    if (!kind) {
      throw new InvalidArgumentError(`Unknown fence "${fence}".`);
    }

    const config = resolveRendererConfig(options);
    const body = await readStdin();
    const result = await renderFence(
      { kind, declaredLanguage: fence, rawAttributes: options.attr, body },
      { config },
    );

    process.stdout.write(`${result.fragment}\n`);
    if (!result.ok && options.strict) {
      process.exitCode = 2;
    }
  });

  await program.parseAsync(process.argv);
}

main().catch((error) => {
  console.error("❌ Rendering failed:", error);
  process.exit(1);
});

export { main as renderFenceMain };
