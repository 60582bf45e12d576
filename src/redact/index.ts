/**
 * Redaction
 *
 * Internal diagnostic text travels inside error messages framed by two
 * invisible marker characters. Logs keep the message as is; anything that
 * crosses to the client goes through `clean()` first, which drops every
 * framed section.
 *
 * @module redact
 */

/** Opens a hidden section (INVISIBLE TIMES) */
export const HIDDEN_START = '\u2062';

/** Closes a hidden section (INVISIBLE SEPARATOR) */
export const HIDDEN_END = '\u2063';

/**
 * Frame text so that `clean()` removes it.
 * Marker characters already inside the text are stripped so the frame stays balanced.
 */
export function hide(text: string): string {
  const inner = text.split(HIDDEN_START).join('').split(HIDDEN_END).join('');
  return `${HIDDEN_START}${inner}${HIDDEN_END}`;
}

/**
 * Remove every hidden section from text.
 * A section without a closing marker runs to the end of the string.
 * A stray closing marker is dropped on its own.
 */
export function clean(text: string): string {
  let result = '';
  let depth = 0;
  for (const ch of text) {
    if (ch === HIDDEN_START) {
      depth++;
    } else if (ch === HIDDEN_END) {
      if (depth > 0) depth--;
    } else if (depth === 0) {
      result += ch;
    }
  }
  return result.trim();
}

/**
 * Whether text carries any hidden section.
 */
export function hasHidden(text: string): boolean {
  return text.includes(HIDDEN_START);
}

/**
 * Render text for a log line: hidden sections stay, their markers become brackets.
 */
export function reveal(text: string): string {
  return text.split(HIDDEN_START).join('[').split(HIDDEN_END).join(']');
}
