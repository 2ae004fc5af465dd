// lib/sequences.ts
import { ArgumentError } from "./errors";

/** Nucleotide code: 0..3 (A, C, G, T in the caller's convention). */
export type NucCode = 0 | 1 | 2 | 3;

/** Row-stochastic 4x4 transition matrix: pmat[from][to]. */
export type SubstitutionMatrix = readonly (readonly number[])[];

const isNucCode = (x: number): x is NucCode => x === 0 || x === 1 || x === 2 || x === 3;

/**
 * Mutate each site of `seq` in place by sampling the row of `pmat` for its
 * current code. `random` must return uniform draws in [0, 1).
 */
export function evolveSequence(
  pmat: SubstitutionMatrix,
  seq: number[],
  random: () => number = Math.random,
): number[] {
  if (!Array.isArray(pmat) || pmat.length !== 4 || !pmat.every((row) => Array.isArray(row) && row.length === 4)) {
    throw new ArgumentError("substitution matrix must be 4x4");
  }
  if (!pmat.every((row) => row.every(Number.isFinite))) {
    throw new ArgumentError("substitution matrix entries must be finite numbers");
  }
  if (!Array.isArray(seq)) throw new ArgumentError("sequence must be an array");
  if (!seq.every(isNucCode)) {
    throw new ArgumentError(`invalid nucleotide code ${seq.find((x) => !isNucCode(x))}`);
  }

  // cumulative rows; the last bucket is closed at 1
  const cum = pmat.map((p) => [p[0], p[0] + p[1], p[0] + p[1] + p[2], 1]);

  seq.forEach((nuc, k) => {
    const c = cum[nuc];
    const r = random();
    seq[k] = r < c[1] ? (r < c[0] ? 0 : 1) : r < c[2] ? 2 : 3;
  });
  return seq;
}

/** Number of positions where two equal-length strings differ. */
export function hamming(a: string, b: string): number {
  if (a.length !== b.length) throw new ArgumentError(`length mismatch: ${a.length} vs ${b.length}`);
  let count = 0;
  for (let i = 0; i < a.length; i++) if (a[i] !== b[i]) count++;
  return count;
}

/** Minimum Hamming distance over all pairs in seqs1 x seqs2. */
export function minPairwiseDistance(seqs1: readonly string[], seqs2: readonly string[]): number {
  if (!Array.isArray(seqs1) || !Array.isArray(seqs2)) {
    throw new ArgumentError("wrong args: not sequences");
  }
  if (seqs1.length === 0 || seqs2.length === 0) {
    throw new ArgumentError("both sequence sets must be non-empty");
  }
  const len = seqs1[0].length;
  for (const s of [...seqs1, ...seqs2]) {
    if (typeof s !== "string") throw new ArgumentError("sequences must be strings");
    if (s.length !== len) throw new ArgumentError(`length mismatch: expected ${len}, got ${s.length}`);
  }

  let best = len + 1;
  for (const a of seqs1) {
    for (const b of seqs2) {
      best = Math.min(best, hamming(a, b));
      if (best === 0) return 0;
    }
  }
  return best;
}
