import type { RendererConfig } from "../config.js";
import type { FenceKind } from "../types.js";
import { FreezeRenderer } from "./freeze.js";
import { PikchrRenderer } from "./pikchr.js";
import type { FenceRenderer } from "./types.js";

export { FreezeRenderer, FREEZE_STYLE_ARGS, freezeArgs } from "./freeze.js";
export { PikchrRenderer, PIKCHR_ARGS } from "./pikchr.js";
export { runProcess, describeExit, type ProcessOutcome, type RunProcessOptions } from "./process.js";
export type { FenceRenderer, RendererOutput } from "./types.js";

export type RendererSet = Record<FenceKind, FenceRenderer>;

/**
 * The default renderer for each fence kind.
 */
export function createRenderers(config: RendererConfig): RendererSet {
  return {
    "code-image": new FreezeRenderer(config),
    diagram: new PikchrRenderer(config),
  };
}
