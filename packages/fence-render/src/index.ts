/**
 * Library exports for @docfence/fence-render
 */

// Pipeline
export { renderFence, renderFenceBatch, type RenderFenceOptions } from "./pipeline.js";

// Attribute validation
export {
  validateOptions,
  TERMINAL_LANGUAGE,
  ANSI_LANGUAGE,
  DIAGRAM_LANGUAGE,
  DIAGRAM_FALLBACK_WIDTH,
  type ValidationResult,
} from "./options.js";

// Terminal escapes
export { materializeEscapes, TERMINAL_REPLACEMENTS, type MaterializedSource } from "./escapes.js";

// SVG normalization
export {
  normalizeSvg,
  stripPreamble,
  extractDimensions,
  makeScalable,
  markDecorative,
  resolveSizing,
  MISSING_DIMENSIONS_DIAGNOSTIC,
  type NormalizeResult,
} from "./svg.js";

// Fragments
export { buildStyle, composeFragment, composeDiagnostic, VISUALLY_HIDDEN_STYLE } from "./fragment.js";

// Renderers
export {
  createRenderers,
  FreezeRenderer,
  PikchrRenderer,
  runProcess,
  type FenceRenderer,
  type RendererOutput,
  type RendererSet,
  type ProcessOutcome,
} from "./renderers/index.js";

// Configuration
export {
  createRendererConfig,
  configFromEnv,
  validateConfig,
  defaultConfig,
  DEFAULT_RENDER_TIMEOUT,
  type RendererConfig,
} from "./config.js";

export type * from "./types.js";
