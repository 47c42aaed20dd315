/**
 * Vector arithmetic shared by the index and the ranker
 */

export function dot(a: ArrayLike<number>, b: ArrayLike<number>): number {
  let sum = 0;
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    sum += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return sum;
}

export function magnitude(a: ArrayLike<number>): number {
  return Math.sqrt(dot(a, a));
}

/**
 * Copy into a unit-length Float32Array. Zero vectors stay zero.
 */
export function normalize(vector: ArrayLike<number>): Float32Array {
  const out = new Float32Array(vector.length);
  const norm = magnitude(vector);
  if (norm === 0) return out;
  for (let i = 0; i < vector.length; i++) {
    out[i] = (vector[i] ?? 0) / norm;
  }
  return out;
}

/**
 * Cosine distance between two unit vectors, in [0, 2]
 */
export function unitCosineDistance(a: Float32Array, b: Float32Array): number {
  const d = 1 - dot(a, b);
  // float32 rounding can push identical vectors slightly below zero
  return d < 0 ? 0 : d;
}

export function isFiniteVector(vector: ArrayLike<number>): boolean {
  for (let i = 0; i < vector.length; i++) {
    if (!Number.isFinite(vector[i])) return false;
  }
  return true;
}

/**
 * Deterministic PRNG (mulberry32), returns floats in [0, 1)
 */
export function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
