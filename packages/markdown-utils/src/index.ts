/**
 * Markdown Utilities
 *
 * Shared helpers for reading fenced blocks out of Markdown and for
 * producing safe HTML.
 */

// Fence info strings
export { parseFenceAttributes, parseFenceInfo, type FenceInfo } from "./fence-attributes.js";

// HTML helpers
export { escapeHtml } from "./html.js";
