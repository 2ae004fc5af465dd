// lib/masks.ts
import { ArgumentError } from "./errors";

/**
 * True when `a` and `b` each share at least one set position with `s`
 * (not necessarily the same position). Non-zero entries count as set.
 */
export function nonEmptyIntersection(
  a: ArrayLike<number>,
  b: ArrayLike<number>,
  s: ArrayLike<number>,
): boolean {
  for (const m of [a, b, s]) {
    if (m == null || typeof m.length !== "number") throw new ArgumentError("masks must be arrays");
  }
  if (a.length !== s.length || b.length !== s.length) throw new ArgumentError(`length mismatch: ${a.length}, ${b.length}, ${s.length}`);

  const meets = (m: ArrayLike<number>) => {
    for (let k = 0; k < s.length; k++) if (m[k] && s[k]) return true;
    return false;
  };
  return meets(a) && meets(b);
}
