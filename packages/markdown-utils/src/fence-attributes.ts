/**
 * Fence Info String Parsing
 *
 * Reads the attribute list of a fenced code block. Both of these forms are
 * understood:
 *
 * ```freeze {language="go" width="50%"}
 * ```{.freeze language=go center=false}
 *
 * In the second (brace-first) form the first `.class` names the fence.
 */

export interface FenceInfo {
  /** Fence name: the info-string language, or the first `.class` in brace form */
  name?: string;
  /** Attributes in source order; later duplicates overwrite earlier ones */
  attributes: Map<string, string>;
}

const TOKEN_RE =
  /([.#])([\w-]+)|([\w:-]+)\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'}]+))|\S+/g;

/**
 * Parse an attribute list such as `{language="go" width=50%}`.
 *
 * Braces are optional. `.class` and `#id` tokens and anything that is not a
 * `key=value` pair are ignored.
 */
export function parseFenceAttributes(meta: string | null | undefined): Map<string, string> {
  return tokenize(meta ?? "").attributes;
}

/**
 * Split a full info string (language + meta, as written after the opening
 * fence) into a fence name and its attributes.
 */
export function parseFenceInfo(info: string | null | undefined): FenceInfo {
  const trimmed = (info ?? "").trim();
  if (!trimmed) {
    return { attributes: new Map() };
  }

  if (trimmed.startsWith("{")) {
    const { attributes, classes } = tokenize(trimmed);
    return { name: classes[0], attributes };
  }

  const space = trimmed.search(/\s/);
  if (space === -1) {
    return { name: trimmed, attributes: new Map() };
  }
  return {
    name: trimmed.slice(0, space),
    attributes: parseFenceAttributes(trimmed.slice(space + 1)),
  };
}

function tokenize(meta: string): { attributes: Map<string, string>; classes: string[] } {
  const attributes = new Map<string, string>();
  const classes: string[] = [];

  const inner = meta.trim().replace(/^\{/, "").replace(/\}$/, "");
  for (const match of inner.matchAll(TOKEN_RE)) {
    const [, sigil, identifier, key, doubleQuoted, singleQuoted, bare] = match;
    if (sigil === "." && identifier) {
      classes.push(identifier);
    } else if (key) {
      attributes.set(key, doubleQuoted ?? singleQuoted ?? bare ?? "");
    }
  }

  return { attributes, classes };
}
