/**
 * Append-only vector arena
 *
 * Vectors live in integer slots that are never reused or moved. A slot
 * appended at version v is visible to every snapshot whose length covers it;
 * once replaced or removed at version w it stays visible to snapshots older
 * than w. Readers therefore never need the write lock.
 */

const LIVE = Number.POSITIVE_INFINITY;

export class VectorArena {
  private readonly vectors: Float32Array[] = [];
  private readonly ids: string[] = [];
  private readonly supersededAt: number[] = [];
  private readonly slotById = new Map<string, number>();

  constructor(readonly dimension: number) {}

  /** Slots allocated so far (live and superseded) */
  get length(): number {
    return this.vectors.length;
  }

  /** Latest live slot for an id */
  slotOf(id: string): number | undefined {
    return this.slotById.get(id);
  }

  /**
   * Append a unit vector. Any previous slot of the same id is superseded at
   * `version`. Returns the previous slot, if there was one.
   */
  append(id: string, vector: Float32Array, version: number): number | undefined {
    const previous = this.slotById.get(id);
    if (previous !== undefined) {
      this.supersededAt[previous] = version;
    }

    const slot = this.vectors.length;
    this.vectors.push(vector);
    this.ids.push(id);
    this.supersededAt.push(LIVE);
    this.slotById.set(id, slot);
    return previous;
  }

  /**
   * Supersede the live slot of an id at `version`
   */
  retire(id: string, version: number): boolean {
    const slot = this.slotById.get(id);
    if (slot === undefined) return false;
    this.supersededAt[slot] = version;
    this.slotById.delete(id);
    return true;
  }

  isVisible(slot: number, version: number): boolean {
    return (this.supersededAt[slot] ?? 0) > version;
  }

  idAt(slot: number): string {
    const id = this.ids[slot];
    if (id === undefined) {
      throw new RangeError(`Arena slot ${slot} out of range`);
    }
    return id;
  }

  vectorAt(slot: number): Float32Array {
    const vector = this.vectors[slot];
    if (vector === undefined) {
      throw new RangeError(`Arena slot ${slot} out of range`);
    }
    return vector;
  }
}
