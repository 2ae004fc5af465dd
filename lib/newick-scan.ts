// lib/newick-scan.ts
//
// Cursor helpers shared by the Newick parser. Every offset returned is
// relative to `from`, so callers add it to their own cursor.

export const NOT_FOUND = -1;

const isWS = (c: string) => /\s/.test(c);

/** Number of whitespace characters starting at `from`. */
export function skipSpaces(text: string, from = 0): number {
  let i = from;
  while (i < text.length && isWS(text[i])) i++;
  return i - from;
}

export function containsChar(ch: string, set: string): boolean {
  return ch.length === 1 && set.includes(ch);
}

/**
 * Offset of the first `target`, or of the first `stopSet` character if one
 * comes earlier. Look at the character at the returned offset to tell which.
 */
export function findIndex(text: string, target: string, stopSet: string, from = 0): number {
  for (let i = from; i < text.length; i++) {
    const c = text[i];
    if (c === target || containsChar(c, stopSet)) return i - from;
  }
  return NOT_FOUND;
}

/**
 * `from` sits just past an opening delimiter. Returns the offset of the first
 * `closer` that is not preceded by a backslash, i.e. the content length.
 */
export function extractEscaped(text: string, closer: string, from = 0): number {
  for (let i = from; i < text.length; i++) {
    if (text[i] === closer && !(i > from && text[i - 1] === "\\")) return i - from;
  }
  return NOT_FOUND;
}
