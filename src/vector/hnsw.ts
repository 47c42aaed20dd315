/**
 * Hierarchical Navigable Small World graph over arena slots
 *
 * A graph is built once over slots [0, size) of an arena and never changes
 * after it is published. Vectors appended to the arena later are outside the
 * graph and are scanned exactly by the engine until the next rebuild.
 */

import { BinaryHeap } from './heap.js';
import { createRandom, unitCosineDistance } from './math.js';
import type { VectorArena } from './arena.js';

export interface HnswParams {
  /** Max links per node on upper layers; layer 0 keeps 2*m */
  m: number;
  efConstruction: number;
  efSearch: number;
  seed: number;
}

export interface ScoredSlot {
  slot: number;
  distance: number;
}

export interface HnswBuildOptions {
  /** Nodes inserted between event-loop yields */
  yieldEvery: number;
}

const MAX_LEVEL = 16;

function compareScored(a: ScoredSlot, b: ScoredSlot): number {
  return a.distance - b.distance || a.slot - b.slot;
}

export function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export class HnswGraph {
  private readonly links: number[][][] = [];
  private entryPoint = -1;
  private maxLayer = -1;
  private readonly random: () => number;
  private readonly levelMultiplier: number;

  private constructor(
    private readonly arena: VectorArena,
    private readonly params: HnswParams
  ) {
    this.random = createRandom(params.seed);
    this.levelMultiplier = 1 / Math.log(Math.max(2, params.m));
  }

  /**
   * Build a graph over the first `count` slots of `arena`
   */
  static async build(
    arena: VectorArena,
    count: number,
    params: HnswParams,
    options: HnswBuildOptions
  ): Promise<HnswGraph> {
    const graph = new HnswGraph(arena, params);
    const yieldEvery = Math.max(1, options.yieldEvery);

    for (let slot = 0; slot < count; slot++) {
      graph.add(slot);
      if ((slot + 1) % yieldEvery === 0) {
        await yieldToEventLoop();
      }
    }

    return graph;
  }

  /** Slots covered by the graph */
  get size(): number {
    return this.links.length;
  }

  /**
   * Approximate nearest slots to a unit query vector, ascending by distance.
   * Returns up to max(ef, k) candidates; callers mask superseded slots.
   */
  search(query: Float32Array, k: number, ef: number = this.params.efSearch): ScoredSlot[] {
    if (this.entryPoint < 0) return [];

    let current = this.entryPoint;
    for (let layer = this.maxLayer; layer > 0; layer--) {
      current = this.greedyStep(query, current, layer);
    }

    return this.searchLayer(query, current, Math.max(ef, k), 0);
  }

  private add(slot: number): void {
    const vector = this.arena.vectorAt(slot);
    const level = this.randomLevel();
    const nodeLinks: number[][] = [];
    for (let layer = 0; layer <= level; layer++) {
      nodeLinks.push([]);
    }
    this.links.push(nodeLinks);

    if (this.entryPoint < 0) {
      this.entryPoint = slot;
      this.maxLayer = level;
      return;
    }

    let current = this.entryPoint;
    for (let layer = this.maxLayer; layer > level; layer--) {
      current = this.greedyStep(vector, current, layer);
    }

    for (let layer = Math.min(level, this.maxLayer); layer >= 0; layer--) {
      const candidates = this.searchLayer(vector, current, this.params.efConstruction, layer);
      const selected = candidates.filter((c) => c.slot !== slot).slice(0, this.params.m);
      const maxLinks = layer === 0 ? this.params.m * 2 : this.params.m;

      nodeLinks[layer] = selected.map((c) => c.slot);

      for (const neighbor of selected) {
        const neighborLinks = this.layerLinks(neighbor.slot, layer);
        neighborLinks.push(slot);
        if (neighborLinks.length > maxLinks) {
          this.prune(neighbor.slot, layer, maxLinks);
        }
      }

      const closest = selected[0];
      if (closest !== undefined) {
        current = closest.slot;
      }
    }

    if (level > this.maxLayer) {
      this.maxLayer = level;
      this.entryPoint = slot;
    }
  }

  private randomLevel(): number {
    const level = Math.floor(-Math.log(1 - this.random()) * this.levelMultiplier);
    return Math.min(level, MAX_LEVEL);
  }

  private layerLinks(slot: number, layer: number): number[] {
    const node = this.links[slot];
    if (node === undefined) {
      throw new RangeError(`Graph node ${slot} out of range`);
    }
    let list = node[layer];
    if (list === undefined) {
      list = [];
      node[layer] = list;
    }
    return list;
  }

  /** Keep the `maxLinks` closest links of a node on one layer */
  private prune(slot: number, layer: number, maxLinks: number): void {
    const base = this.arena.vectorAt(slot);
    const node = this.links[slot];
    if (node === undefined) return;

    node[layer] = this.layerLinks(slot, layer)
      .map((other) => ({ slot: other, distance: unitCosineDistance(base, this.arena.vectorAt(other)) }))
      .sort(compareScored)
      .slice(0, maxLinks)
      .map((c) => c.slot);
  }

  private greedyStep(query: Float32Array, entry: number, layer: number): number {
    const best = this.searchLayer(query, entry, 1, layer)[0];
    return best === undefined ? entry : best.slot;
  }

  private searchLayer(query: Float32Array, entry: number, ef: number, layer: number): ScoredSlot[] {
    const visited = new Set<number>([entry]);
    const start: ScoredSlot = {
      slot: entry,
      distance: unitCosineDistance(query, this.arena.vectorAt(entry)),
    };

    const candidates = new BinaryHeap<ScoredSlot>(compareScored);
    const results = new BinaryHeap<ScoredSlot>((a, b) => compareScored(b, a));
    candidates.push(start);
    results.push(start);

    for (;;) {
      const current = candidates.pop();
      if (current === undefined) break;

      const farthest = results.peek();
      if (farthest !== undefined && results.size >= ef && current.distance > farthest.distance) {
        break;
      }

      const neighbors = this.links[current.slot]?.[layer] ?? [];
      for (const neighbor of neighbors) {
        if (visited.has(neighbor)) continue;
        visited.add(neighbor);

        const scored: ScoredSlot = {
          slot: neighbor,
          distance: unitCosineDistance(query, this.arena.vectorAt(neighbor)),
        };
        const worst = results.peek();
        if (results.size < ef || (worst !== undefined && compareScored(scored, worst) < 0)) {
          candidates.push(scored);
          results.push(scored);
          if (results.size > ef) {
            results.pop();
          }
        }
      }
    }

    return results.toArray().sort(compareScored);
  }
}
