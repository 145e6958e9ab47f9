/**
 * Remark plugin for rendered fences
 *
 * Replaces fenced code blocks whose language names a registered fence with
 * the HTML fragment the fence renders to. Usage in markdown:
 *
 * ```freeze {language="terminal" width="60%"}
 * $ make docs
 * {green}OK{reset} site written to dist/
 * ```
 *
 * ```pikchr {float="right"}
 * box "A"; arrow; box "B"
 * ```
 */

import { visit } from "unist-util-visit";
import type { Code, Html, Root, RootContent } from "mdast";
import type { Plugin } from "unified";
import { parseFenceInfo } from "@docfence/markdown-utils";
import {
  renderFenceBatch,
  type BlockRequest,
  type FenceKind,
  type RenderFenceOptions,
} from "@docfence/fence-render";

/**
 * Fence names recognized by default and the kind each renders as.
 */
export const DEFAULT_FENCES: Readonly<Record<string, FenceKind>> = {
  freeze: "code-image",
  pikchr: "diagram",
};

export interface RemarkFencesOptions extends RenderFenceOptions {
  /**
   * Fence name to kind mapping
   * @default DEFAULT_FENCES
   */
  fences?: Readonly<Record<string, FenceKind>>;

  /**
   * Maximum number of renderer processes running at once
   * @default 4
   */
  concurrency?: number;
}

interface PendingFence {
  siblings: RootContent[];
  index: number;
  request: BlockRequest;
}

/**
 * Build a fence request from a code node, or null if the node is an
 * ordinary code block.
 */
export function fenceRequestFor(
  node: Code,
  fences: Readonly<Record<string, FenceKind>> = DEFAULT_FENCES,
): BlockRequest | null {
  const info = parseFenceInfo([node.lang, node.meta].filter(Boolean).join(" "));
  if (!info.name) return null;

  const kind = new Map(Object.entries(fences)).get(info.name);
  if (!kind) return null;

  return {
    kind,
    declaredLanguage: info.name,
    rawAttributes: info.attributes,
    body: node.value,
  };
}

/**
 * Remark plugin that renders registered fences into inline HTML.
 */
export const remarkFences: Plugin<[RemarkFencesOptions?], Root> = (options = {}) => {
  const { fences = DEFAULT_FENCES, concurrency, ...renderOptions } = options;

  return async (tree: Root) => {
    const pending: PendingFence[] = [];

    visit(tree, "code", (node: Code, index, parent) => {
      if (!parent || index === undefined) return;
      const request = fenceRequestFor(node, fences);
      if (!request) return;

      const siblings: RootContent[] = parent.children;
      pending.push({ siblings, index, request });
    });

    if (pending.length === 0) return;

    const results = await renderFenceBatch(
      pending.map((fence) => fence.request),
      renderOptions,
      concurrency,
    );

    // Replacements are one-for-one, so collected indices stay valid
    pending.forEach((fence, i) => {
      const html: Html = { type: "html", value: results[i].fragment };
      fence.siblings[fence.index] = html;
    });
  };
};

export default remarkFences;
