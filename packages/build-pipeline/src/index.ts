/**
 * Library exports for @docfence/build-pipeline
 *
 * These utilities can be used programmatically for custom documentation builds.
 */

// Remark plugin
export { remarkFences, fenceRequestFor, DEFAULT_FENCES, type RemarkFencesOptions } from "./remark-fences.js";

// Markdown rendering
export { renderMarkdown, hasHighlightableCode, type RenderMarkdownOptions } from "./markdown-renderer.js";

// Page rendering
export { renderDocsFiles, outputPathFor, type RenderDocsOptions, type RenderedPage } from "./docs-renderer.js";

// Command-line helpers
export {
  addRendererOptions,
  resolveRendererConfig,
  parsePositiveInt,
  collectAttribute,
  type RendererCliOptions,
} from "./cli-options.js";
