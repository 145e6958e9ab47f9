/**
 * Fence Attribute Validation
 *
 * Turns the raw attribute map of a fenced block into typed RenderOptions.
 * Recognized keys are consumed; everything else is passed through untouched.
 */

import { z } from "zod";
import type { FenceKind, FloatSide, RenderOptions } from "./types.js";

/**
 * Pseudo-language for terminal transcripts. freeze knows it as "ansi".
 */
export const TERMINAL_LANGUAGE = "terminal";
export const ANSI_LANGUAGE = "ansi";

/**
 * Language reported for diagrams, which take no language attribute.
 */
export const DIAGRAM_LANGUAGE = "pikchr";

/**
 * Width of a diagram whose SVG declares no size.
 */
export const DIAGRAM_FALLBACK_WIDTH = "100%";

const floatSchema = z.enum(["left", "right"]);

// Anything but the literal "true" reads as false.
const centerSchema = z.string().transform((value) => value === "true");

export type ValidationResult =
  | { ok: true; options: RenderOptions }
  | { ok: false; diagnostic: string };

/**
 * Validate the attributes of a fenced block.
 *
 * `float` flips the default of `center` to false; an explicit `center="true"`
 * wins over `float` and clears it. Code images must name a language.
 */
export function validateOptions(
  kind: FenceKind,
  rawAttributes: ReadonlyMap<string, string>,
): ValidationResult {
  const inputs = new Map(rawAttributes);

  let float: FloatSide | undefined;
  let defaultCenter = "true";
  const rawFloat = take(inputs, "float");
  if (rawFloat !== undefined) {
    const parsed = floatSchema.safeParse(rawFloat);
    if (!parsed.success) {
      return {
        ok: false,
        diagnostic: `invalid float "${rawFloat}": expected "left" or "right"`,
      };
    }
    float = parsed.data;
    defaultCenter = "false";
  }

  const width = take(inputs, "width");

  let language = DIAGRAM_LANGUAGE;
  let terminal = false;
  if (kind === "code-image") {
    const rawLanguage = take(inputs, "language");
    if (!rawLanguage) {
      return { ok: false, diagnostic: 'missing required option "language"' };
    }
    terminal = rawLanguage === TERMINAL_LANGUAGE;
    language = terminal ? ANSI_LANGUAGE : rawLanguage;
  }

  const center = centerSchema.parse(take(inputs, "center") ?? defaultCenter);
  if (center) {
    float = undefined;
  }

  return {
    ok: true,
    options: {
      kind,
      width,
      fallbackWidth: kind === "diagram" ? DIAGRAM_FALLBACK_WIDTH : undefined,
      center,
      float,
      language,
      terminal,
      passthrough: inputs,
    },
  };
}

function take(inputs: Map<string, string>, key: string): string | undefined {
  const value = inputs.get(key);
  inputs.delete(key);
  return value;
}
