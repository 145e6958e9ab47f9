/**
 * pikchr renderer
 *
 * Renders a pikchr diagram to SVG. pikchr reads the program from stdin
 * (`-`) and prints the SVG on stdout.
 */

import type { RendererConfig } from "../config.js";
import type { RenderOptions } from "../types.js";
import { describeExit, runProcess } from "./process.js";
import type { FenceRenderer, RendererOutput } from "./types.js";

export const PIKCHR_ARGS = ["--dark-mode", "--svg-only", "-"] as const;

export class PikchrRenderer implements FenceRenderer {
  readonly kind = "diagram";
  readonly cssClass = "pikchr";

  constructor(private readonly config: Pick<RendererConfig, "pikchrBin" | "timeoutMs">) {}

  async render(_options: RenderOptions, source: string): Promise<RendererOutput> {
    const outcome = await runProcess(this.config.pikchrBin, PIKCHR_ARGS, source, {
      timeoutMs: this.config.timeoutMs,
    });

    if (outcome.kind === "failed") {
      return { ok: false, failure: "spawn", diagnostic: outcome.error.message };
    }
    if (outcome.exitCode !== 0) {
      return { ok: false, failure: "process", diagnostic: describeExit(this.config.pikchrBin, outcome) };
    }
    return { ok: true, svg: outcome.stdout };
  }
}
