/**
 * Windowed count-min sketch
 *
 * Two generations of counters: accesses land in `current`; every `windowMs`
 * the current generation becomes `previous`. Estimates add the previous
 * generation weighted by the share of the window that has not yet elapsed,
 * which approximates a sliding window without per-key timestamps.
 */

import { fnv1a } from '../embeddings/hashing.js';

const MAX_COUNT = 0xffffffff;

export class FrequencySketch {
  private current: Uint32Array;
  private previous: Uint32Array;
  private windowStart: number;
  private readonly seeds: number[];

  constructor(
    private readonly width: number,
    private readonly depth: number,
    private readonly windowMs: number,
    private readonly now: () => number = Date.now
  ) {
    this.current = new Uint32Array(width * depth);
    this.previous = new Uint32Array(width * depth);
    this.windowStart = now();
    this.seeds = [];
    for (let row = 0; row < depth; row++) {
      this.seeds.push((0x811c9dc5 ^ Math.imul(row + 1, 0x9e3779b1)) >>> 0);
    }
  }

  increment(key: string): void {
    this.rotate();
    for (let row = 0; row < this.depth; row++) {
      const cell = this.cell(row, key);
      const count = this.current[cell] ?? 0;
      if (count < MAX_COUNT) {
        this.current[cell] = count + 1;
      }
    }
  }

  estimate(key: string): number {
    this.rotate();
    let currentMin = MAX_COUNT;
    let previousMin = MAX_COUNT;
    for (let row = 0; row < this.depth; row++) {
      const cell = this.cell(row, key);
      currentMin = Math.min(currentMin, this.current[cell] ?? 0);
      previousMin = Math.min(previousMin, this.previous[cell] ?? 0);
    }
    const elapsed = this.now() - this.windowStart;
    const carry = Math.max(0, 1 - elapsed / this.windowMs);
    return currentMin + previousMin * carry;
  }

  private cell(row: number, key: string): number {
    const seed = this.seeds[row] ?? 0x811c9dc5;
    return row * this.width + (fnv1a(key, seed) % this.width);
  }

  private rotate(): void {
    const now = this.now();
    const elapsed = now - this.windowStart;
    if (elapsed < this.windowMs) return;

    const windows = Math.floor(elapsed / this.windowMs);
    if (windows >= 2) {
      this.previous.fill(0);
    } else {
      this.previous = this.current;
    }
    this.current = new Uint32Array(this.width * this.depth);
    this.windowStart += windows * this.windowMs;
  }
}
