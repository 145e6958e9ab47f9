import type { FenceKind, RenderOptions } from "../types.js";

/**
 * Result of one renderer invocation: the SVG it printed, or why it did not.
 */
export type RendererOutput =
  | { ok: true; svg: string }
  | { ok: false; failure: "process" | "spawn"; diagnostic: string };

/**
 * An external program that turns a fence body into an SVG document.
 */
export interface FenceRenderer {
  readonly kind: FenceKind;
  /** CSS class put on the fragment container */
  readonly cssClass: string;
  render(options: RenderOptions, source: string): Promise<RendererOutput>;
}
