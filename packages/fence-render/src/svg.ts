/**
 * SVG Output Normalization
 *
 * Renderers emit fixed-size SVG documents. These helpers make them scale with
 * their container: the intrinsic width/height become a viewBox and the
 * container's CSS takes over sizing.
 *
 * Each step works on the text of the root `<svg ...>` start tag only, so
 * attributes on nested elements (`stroke-width`, a `<rect width>`) are never
 * touched.
 */

import type { Dimensions, RenderOptions, Sizing } from "./types.js";

export const MISSING_DIMENSIONS_DIAGNOSTIC = "Could not find width and height in svg";

const ROOT_TAG_RE = /<svg\b[^>]*>/i;

// XML declarations, comments and a doctype ahead of the root element.
const PREAMBLE_RE =
  /^\uFEFF?\s*(?:(?:<\?xml[\s\S]*?\?>|<!--[\s\S]*?-->|<!DOCTYPE[^[>]*(?:\[[\s\S]*?\])?\s*>)\s*)*/i;

export type NormalizeResult =
  | { ok: true; markup: string; sizing: Sizing; dimensions: Dimensions | null }
  | { ok: false; diagnostic: string };

/**
 * Remove everything ahead of the root element that does not belong inline in
 * HTML. A document without a preamble is returned unchanged.
 */
export function stripPreamble(svg: string): string {
  return svg.replace(PREAMBLE_RE, "");
}

/**
 * Read the intrinsic size of the document from its root element.
 *
 * Only the root `width`/`height` attributes count, unless `useViewBox` is set:
 * pikchr omits them and only declares a viewBox, whose extent is used instead.
 * Returns null when no usable size is found.
 */
export function extractDimensions(svg: string, useViewBox = false): Dimensions | null {
  const root = findRootTag(svg);
  if (!root) return null;

  const width = parseLength(readAttribute(root.tag, "width"));
  const height = parseLength(readAttribute(root.tag, "height"));
  if (width !== null && height !== null) {
    return { width, height };
  }
  if (!useViewBox) return null;

  const viewBox = readAttribute(root.tag, "viewBox");
  if (viewBox !== undefined) {
    const parts = viewBox.trim().split(/[\s,]+/).map(Number);
    if (parts.length === 4 && parts.every((n) => Number.isFinite(n))) {
      const [, , w, h] = parts;
      if (w > 0 && h > 0) {
        return { width: w, height: h };
      }
    }
  }

  return null;
}

/**
 * Give the root element a viewBox of its intrinsic size (unless it already
 * has one) and drop its fixed width and height attributes.
 */
export function makeScalable(svg: string, dimensions: Dimensions): string {
  return rewriteRootTag(svg, (tag) => {
    let rewritten = tag;
    if (readAttribute(rewritten, "viewBox") === undefined) {
      rewritten = rewritten.replace(
        /^<svg\b/i,
        (open) => `${open} viewBox="0 0 ${dimensions.width} ${dimensions.height}"`,
      );
    }
    return removeAttribute(removeAttribute(rewritten, "width"), "height");
  });
}

/**
 * Hide the image from assistive technology; a text copy of the block is
 * provided next to it.
 */
export function markDecorative(svg: string): string {
  return rewriteRootTag(svg, (tag) => {
    if (readAttribute(tag, "aria-hidden") !== undefined) return tag;
    return tag.replace(/^<svg\b/i, (open) => `${open} aria-hidden="true" focusable="false"`);
  });
}

/**
 * Decide the CSS size of the container: an explicit width scales the image
 * proportionally, otherwise it is shown at its intrinsic pixel size.
 */
export function resolveSizing(dimensions: Dimensions, options: Pick<RenderOptions, "width">): Sizing {
  if (options.width !== undefined) {
    return { width: options.width, height: "auto" };
  }
  return { width: `${dimensions.width}px`, height: `${dimensions.height}px` };
}

/**
 * Run every normalization step over a renderer's SVG output.
 *
 * Diagrams may be sized from their viewBox; one with no size at all is kept
 * as is and shown at its fallback width. Any other image without a size fails.
 *
 * @param svg - Raw SVG document as printed by the renderer
 * @param options - Validated block options
 * @param accessibleText - When present, the image is marked decorative
 */
export function normalizeSvg(
  svg: string,
  options: Pick<RenderOptions, "kind" | "width" | "fallbackWidth">,
  accessibleText?: string,
): NormalizeResult {
  const stripped = stripPreamble(svg);
  const isDiagram = options.kind === "diagram";

  let markup: string;
  let sizing: Sizing;
  const dimensions = extractDimensions(stripped, isDiagram);
  if (dimensions) {
    markup = makeScalable(stripped, dimensions);
    sizing = resolveSizing(dimensions, options);
  } else {
    const width = isDiagram ? (options.width ?? options.fallbackWidth) : undefined;
    if (width === undefined) {
      return { ok: false, diagnostic: MISSING_DIMENSIONS_DIAGNOSTIC };
    }
    markup = stripped;
    sizing = { width, height: "auto" };
  }

  if (accessibleText !== undefined) {
    markup = markDecorative(markup);
  }

  return { ok: true, markup: markup.trim(), sizing, dimensions };
}

function findRootTag(svg: string): { tag: string; index: number } | null {
  const match = ROOT_TAG_RE.exec(svg);
  if (!match) return null;
  return { tag: match[0], index: match.index };
}

function rewriteRootTag(svg: string, rewrite: (tag: string) => string): string {
  const root = findRootTag(svg);
  if (!root) return svg;
  return svg.slice(0, root.index) + rewrite(root.tag) + svg.slice(root.index + root.tag.length);
}

function attributePattern(name: string): RegExp {
  return new RegExp(`\\s${name}\\s*=\\s*(?:"([^"]*)"|'([^']*)')`);
}

function readAttribute(tag: string, name: string): string | undefined {
  const match = attributePattern(name).exec(tag);
  if (!match) return undefined;
  return match[1] ?? match[2];
}

function removeAttribute(tag: string, name: string): string {
  return tag.replace(attributePattern(name), "");
}

function parseLength(value: string | undefined): number | null {
  if (value === undefined) return null;
  const match = /^\s*(\d+(?:\.\d+)?|\.\d+)(?:px)?\s*$/.exec(value);
  if (!match) return null;
  const parsed = Number(match[1]);
  return parsed > 0 ? parsed : null;
}
