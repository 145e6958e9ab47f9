import type { FenceKind, FenceRenderer, RenderOptions } from "@docfence/fence-render";

/**
 * Renderer stub that draws the block source as text in a fixed-size SVG.
 * Code images declare their size on the root like freeze does, diagrams
 * through a viewBox like pikchr does.
 */
export function echoRenderer(kind: FenceKind, cssClass: string, width = 40, height = 20): FenceRenderer & {
  calls: Array<{ options: RenderOptions; source: string }>;
} {
  const calls: Array<{ options: RenderOptions; source: string }> = [];
  const size = kind === "diagram" ? `viewBox="0 0 ${width} ${height}"` : `width="${width}" height="${height}"`;
  return {
    kind,
    cssClass,
    calls,
    async render(options, source) {
      calls.push({ options, source });
      return { ok: true, svg: `<svg ${size}><text>${source}</text></svg>` };
    },
  };
}
