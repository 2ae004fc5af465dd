// lib/newick-attributes.ts
import { failed, parsed, type Parsed } from "./errors";
import { NOT_FOUND, extractEscaped, findIndex, skipSpaces } from "./newick-scan";

export type Annotation = readonly [name: string, value: string];

export type AttributeList = {
  entries: Annotation[];
  /** Characters read from `from` through the closing ']' */
  consumed: number;
};

const NAME_STOPS = ",]\"{}";
const CLOSERS: Partial<Record<string, string>> = { '"': '"', "{": "}" };

/**
 * Parse `name=value,...]` starting just past a `[&`.
 * Quoted (`"..."`) and braced (`{...}`) values keep escaped delimiters and
 * commas verbatim; bare values run to the next ',' or ']'.
 */
export function parseAttributes(text: string, from: number): Parsed<AttributeList> {
  const entries: Annotation[] = [];
  let i = from;
  if (text[i] === "]") return parsed({ entries, consumed: 1 });

  for (;;) {
    const nameEnd = findIndex(text, "=", NAME_STOPS, i);
    if (nameEnd === NOT_FOUND || text[i + nameEnd] !== "=") {
      return failed("Annotation entry is missing '='", i);
    }
    const name = text.slice(i, i + nameEnd).trim();
    if (!name) return failed("Annotation entry has an empty name", i);
    i += nameEnd + 1;

    let value: string;
    const closer = CLOSERS[text[i + skipSpaces(text, i)] ?? ""];
    if (closer !== undefined) {
      i += skipSpaces(text, i);
      const e = extractEscaped(text, closer, i + 1);
      if (e === NOT_FOUND) return failed(`Unterminated value, expected '${closer}'`, i);
      value = text.slice(i + 1, i + 1 + e);
      i += e + 2;
    } else {
      const e = findIndex(text, ",", "]", i);
      if (e === NOT_FOUND) return failed("Unterminated annotation block", i);
      value = text.slice(i, i + e).trim();
      i += e;
    }
    entries.push([name, value]);

    i += skipSpaces(text, i);
    if (i >= text.length) return failed("Unterminated annotation block", i);
    if (text[i] === "]") break;
    if (text[i] !== ",") return failed(`Expected ',' or ']' after annotation value but found '${text[i]}'`, i);
    i++;
  }

  return parsed({ entries, consumed: i + 1 - from });
}
