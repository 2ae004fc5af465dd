// lib/errors.ts

/** Structural fault in Newick text. `offset` is where the parser gave up. */
export class ParseError extends Error {
  readonly offset: number;

  constructor(message: string, offset: number) {
    super(`${message} (at offset ${offset})`);
    this.name = "ParseError";
    this.offset = offset;
  }
}

/** Bad argument shape handed to a helper; raised before any work is done. */
export class ArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ArgumentError";
  }
}

export function errorMessage(e: unknown, fallback = "Unknown error"): string {
  return e instanceof Error ? e.message : fallback;
}

/* ---------- Result values for the parser's internal steps ---------- */

export type Parsed<T> = { ok: true; value: T } | { ok: false; error: ParseError };

export const parsed = <T,>(value: T): Parsed<T> => ({ ok: true, value });

export const failed = (message: string, offset: number): { ok: false; error: ParseError } => ({
  ok: false,
  error: new ParseError(message, offset),
});
