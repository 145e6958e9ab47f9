/**
 * Fence Rendering Types
 *
 * Shared types for the fenced-block rendering pipeline.
 */

/**
 * The kinds of fenced block the pipeline knows how to render.
 *
 * - `code-image`: source code rendered to an SVG screenshot by `freeze`
 * - `diagram`: a pikchr program rendered to SVG by `pikchr`
 */
export type FenceKind = "code-image" | "diagram";

export type FloatSide = "left" | "right";

/**
 * One fenced block as handed over by the surrounding build.
 */
export interface BlockRequest {
  readonly kind: FenceKind;
  /** The info-string language of the fence, if any (e.g. "freeze") */
  readonly declaredLanguage?: string;
  /** Attributes from the fence info string, in source order */
  readonly rawAttributes: ReadonlyMap<string, string>;
  readonly body: string;
}

/**
 * Validated rendering options. Built once per block and never mutated.
 */
export interface RenderOptions {
  readonly kind: FenceKind;
  /** Explicit CSS width; intrinsic sizing when absent */
  readonly width?: string;
  /** Width used when the image declares no size of its own (diagrams only) */
  readonly fallbackWidth?: string;
  readonly center: boolean;
  readonly float?: FloatSide;
  /** Renderer language identifier ("ansi" for terminal blocks) */
  readonly language: string;
  /** Whether the block body carries terminal color placeholders */
  readonly terminal: boolean;
  /** Attributes the validator did not consume */
  readonly passthrough: ReadonlyMap<string, string>;
}

export type FailureKind = "validation" | "process" | "spawn" | "normalization";

/**
 * Outcome of rendering one block. Failures are values, not exceptions:
 * a failed block still renders as a diagnostic fragment.
 */
export type RenderResult =
  | { ok: true; fragment: string }
  | { ok: false; failure: FailureKind; diagnostic: string; fragment: string };

/**
 * Intrinsic size of a rendered SVG, in pixels.
 */
export interface Dimensions {
  width: number;
  height: number;
}

/**
 * CSS sizing for the fragment container.
 */
export interface Sizing {
  width: string;
  height: string;
}
