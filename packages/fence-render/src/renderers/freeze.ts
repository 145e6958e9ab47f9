/**
 * freeze renderer
 *
 * Renders source code to a framed SVG "screenshot" with freeze. freeze only
 * writes SVG to a named file, so every call gets its own temporary directory.
 */

import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { RendererConfig } from "../config.js";
import type { RenderOptions } from "../types.js";
import { describeExit, runProcess, toError } from "./process.js";
import type { FenceRenderer, RendererOutput } from "./types.js";

/**
 * Window styling passed to every freeze call. Same as `-c full` minus the
 * shadow, which breaks freeze's auto-width calculation.
 */
export const FREEZE_STYLE_ARGS = [
  "--window",
  "--theme=charm",
  "--border.radius=8",
  "--border.width=1",
  "--border.color=#515151",
  "--padding=10,10,10,10",
  "--margin=10,10,10,10",
  "--background=#171717",
] as const;

export function freezeArgs(language: string, outfile: string): string[] {
  return ["--language", language, "--output", outfile, ...FREEZE_STYLE_ARGS];
}

export class FreezeRenderer implements FenceRenderer {
  readonly kind = "code-image";
  readonly cssClass = "freeze";

  constructor(private readonly config: Pick<RendererConfig, "freezeBin" | "timeoutMs">) {}

  async render(options: RenderOptions, source: string): Promise<RendererOutput> {
    let tmpdir: string | undefined;
    try {
      tmpdir = await mkdtemp(path.join(os.tmpdir(), "docfence-freeze-"));
      const outfile = path.join(tmpdir, "output.svg");

      const outcome = await runProcess(
        this.config.freezeBin,
        freezeArgs(options.language, outfile),
        source,
        { timeoutMs: this.config.timeoutMs },
      );
      if (outcome.kind === "failed") {
        return { ok: false, failure: "spawn", diagnostic: outcome.error.message };
      }
      if (outcome.exitCode !== 0) {
        return { ok: false, failure: "process", diagnostic: describeExit(this.config.freezeBin, outcome) };
      }

      const svg = await readFile(outfile, "utf-8");
      return { ok: true, svg };
    } catch (error) {
      return { ok: false, failure: "spawn", diagnostic: toError(error).message };
    } finally {
      if (tmpdir) {
        await rm(tmpdir, { recursive: true, force: true });
      }
    }
  }
}
