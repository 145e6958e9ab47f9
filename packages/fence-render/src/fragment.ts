/**
 * HTML fragments for rendered fences.
 */

import { escapeHtml } from "@docfence/markdown-utils";
import type { RenderOptions, Sizing } from "./types.js";

/**
 * Inline style that hides an element visually but keeps it in the
 * accessibility tree. Inline so the fragment works without site CSS.
 */
export const VISUALLY_HIDDEN_STYLE =
  "position:absolute;width:1px;height:1px;padding:0;margin:-1px;overflow:hidden;clip:rect(0,0,0,0);white-space:pre;border:0;";

export const DIAGNOSTIC_CLASS = "fence-error";

/**
 * Build the container style. `float` and centering never appear together.
 */
export function buildStyle(sizing: Sizing, options: Pick<RenderOptions, "center" | "float">): string {
  let style = `width:${sizing.width};height:${sizing.height};max-width:100%;`;
  if (options.float !== undefined) {
    style += `float:${options.float};`;
  } else if (options.center) {
    style += "margin:0 auto;";
  }
  return style;
}

/**
 * Wrap normalized SVG markup in a styled container, with the accessible
 * text copy (if any) hidden inside the same container.
 */
export function composeFragment(
  markup: string,
  sizing: Sizing,
  options: Pick<RenderOptions, "center" | "float">,
  accessibleText?: string,
  cssClass?: string,
): string {
  const classAttr = cssClass ? ` class="${escapeHtml(cssClass)}"` : "";
  const hidden =
    accessibleText !== undefined
      ? `<pre class="sr-only" style="${VISUALLY_HIDDEN_STYLE}">${escapeHtml(accessibleText)}</pre>`
      : "";
  return `<div${classAttr} style="${buildStyle(sizing, options)}">${markup}${hidden}</div>`;
}

export function composeDiagnostic(message: string): string {
  return `<code class="${DIAGNOSTIC_CLASS}">${escapeHtml(message)}</code>`;
}
