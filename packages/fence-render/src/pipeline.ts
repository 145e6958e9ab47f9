/**
 * Fence Rendering Pipeline
 *
 * validate attributes -> expand terminal escapes -> run the renderer ->
 * normalize the SVG -> compose the fragment.
 *
 * Nothing here throws for a bad block: every failure becomes a diagnostic
 * fragment that takes the block's place in the page.
 */

import { createRendererConfig, type RendererConfig } from "./config.js";
import { materializeEscapes } from "./escapes.js";
import { composeDiagnostic, composeFragment } from "./fragment.js";
import { validateOptions } from "./options.js";
import { createRenderers, type RendererSet } from "./renderers/index.js";
import { toError } from "./renderers/process.js";
import type { FenceRenderer, RendererOutput } from "./renderers/types.js";
import { normalizeSvg } from "./svg.js";
import type { BlockRequest, FailureKind, FenceKind, RenderResult } from "./types.js";

export interface RenderFenceOptions {
  /** Renderers to use instead of the default freeze/pikchr ones */
  renderers?: Partial<RendererSet>;
  /** Overrides for the default renderers' configuration */
  config?: Partial<RendererConfig>;
}

/**
 * Render one fenced block to an HTML fragment.
 */
export async function renderFence(
  request: BlockRequest,
  options: RenderFenceOptions = {},
): Promise<RenderResult> {
  const validation = validateOptions(request.kind, request.rawAttributes);
  if (!validation.ok) {
    return fail(request.kind, "validation", validation.diagnostic);
  }
  const renderOptions = validation.options;
  const renderer = resolveRenderer(request.kind, options);

  let source = request.body;
  let accessibleText: string | undefined;
  if (renderOptions.terminal) {
    const materialized = materializeEscapes(request.body);
    source = materialized.renderSource;
    accessibleText = materialized.accessibleSource;
  } else if (request.kind === "code-image") {
    accessibleText = request.body;
  }

  let output: RendererOutput;
  try {
    output = await renderer.render(renderOptions, source);
  } catch (error) {
    return fail(request.kind, "spawn", toError(error).message);
  }
  if (!output.ok) {
    return fail(request.kind, output.failure, output.diagnostic);
  }

  const normalized = normalizeSvg(output.svg, renderOptions, accessibleText);
  if (!normalized.ok) {
    return fail(request.kind, "normalization", normalized.diagnostic);
  }

  return {
    ok: true,
    fragment: composeFragment(
      normalized.markup,
      normalized.sizing,
      renderOptions,
      accessibleText,
      renderer.cssClass,
    ),
  };
}

/**
 * Render multiple blocks in parallel with concurrency limit.
 *
 * @param requests - Blocks to render
 * @param concurrency - Maximum concurrent renders (default: 4)
 * @returns Results in the same order as the input
 */
export async function renderFenceBatch(
  requests: readonly BlockRequest[],
  options: RenderFenceOptions = {},
  concurrency = 4,
): Promise<RenderResult[]> {
  const results: RenderResult[] = [];
  // Anything but a positive integer renders one block at a time
  const size = Number.isInteger(concurrency) && concurrency > 0 ? concurrency : 1;

  // Process in batches to control concurrency
  for (let i = 0; i < requests.length; i += size) {
    const batch = requests.slice(i, i + size);
    results.push(...(await Promise.all(batch.map((request) => renderFence(request, options)))));
  }

  return results;
}

function resolveRenderer(kind: FenceKind, options: RenderFenceOptions): FenceRenderer {
  const custom = options.renderers?.[kind];
  if (custom) return custom;
  return createRenderers(createRendererConfig(options.config))[kind];
}

function fail(kind: FenceKind, failure: FailureKind, diagnostic: string): RenderResult {
  console.warn(`[fence-render] ${kind} block failed (${failure}): ${diagnostic}`);
  return { ok: false, failure, diagnostic, fragment: composeDiagnostic(diagnostic) };
}
