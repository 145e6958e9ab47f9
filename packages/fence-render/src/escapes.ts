/**
 * Terminal Escape Placeholders
 *
 * Terminal transcripts in the docs are written with readable placeholders
 * like `{green}` instead of raw escape bytes. freeze needs the real ANSI
 * sequences; the screen-reader copy of the block needs neither.
 */

const ESC = "\x1b";

/**
 * Placeholder tokens and the control sequences they stand for, applied in order.
 */
export const TERMINAL_REPLACEMENTS: ReadonlyArray<readonly [token: string, sequence: string]> = [
  ["\\x1b", ESC],
  ["{red}", `${ESC}[0;31m`],
  ["{green}", `${ESC}[0;32m`],
  ["{yellow}", `${ESC}[0;33m`],
  ["{blue}", `${ESC}[0;34m`],
  ["{mag}", `${ESC}[0;35m`],
  ["{cyan}", `${ESC}[0;36m`],
  ["{gray}", `${ESC}[0;90m`],
  ["{reset}", `${ESC}[0;0m`],
];

export interface MaterializedSource {
  /** Body with placeholders turned into control sequences, fed to freeze */
  renderSource: string;
  /** Body with placeholders removed, used as the accessible text */
  accessibleSource: string;
}

/**
 * Expand terminal placeholders.
 *
 * Both variants fold over the same table, so a token is either handled in
 * both or in neither.
 */
export function materializeEscapes(body: string): MaterializedSource {
  return {
    renderSource: TERMINAL_REPLACEMENTS.reduce(
      (text, [token, sequence]) => text.replaceAll(token, sequence),
      body,
    ),
    accessibleSource: TERMINAL_REPLACEMENTS.reduce(
      (text, [token]) => text.replaceAll(token, ""),
      body,
    ),
  };
}
