/**
 * Reverse index — for each article, the set of articles whose first link
 * points at it.
 *
 * Built once from a complete EdgeStore. Distance computation, backward
 * navigation and reach statistics all read from it; nothing writes to it
 * after construction, so the same index serves any number of queries.
 */

import { type EdgeStore } from './edgestore.js';

const EMPTY: ReadonlySet<string> = new Set<string>();

export class ReverseIndex {
  private constructor(private readonly preds: Map<string, Set<string>>) {}

  /** Single pass over every resolved edge. */
  static build(store: EdgeStore): ReverseIndex {
    const preds = new Map<string, Set<string>>();
    for (const [node, succ] of store.entries()) {
      if (succ.kind !== 'resolved') continue;
      let set = preds.get(succ.node);
      if (!set) {
        set = new Set();
        preds.set(succ.node, set);
      }
      set.add(node);
    }
    return new ReverseIndex(preds);
  }

  /**
   * Build partial indexes over contiguous key ranges of the store and merge
   * them. Produces exactly what `build` produces; the partitions are
   * independent of each other.
   */
  static buildPartitioned(store: EdgeStore, partitions: number): ReverseIndex {
    if (!Number.isInteger(partitions) || partitions < 1) {
      throw new RangeError(`partitions must be a positive integer, got ${partitions}`);
    }

    const entries = Array.from(store.entries());
    const chunk = Math.max(1, Math.ceil(entries.length / partitions));
    const partials: Map<string, Set<string>>[] = [];

    for (let lo = 0; lo < entries.length; lo += chunk) {
      const partial = new Map<string, Set<string>>();
      for (const [node, succ] of entries.slice(lo, lo + chunk)) {
        if (succ.kind !== 'resolved') continue;
        let set = partial.get(succ.node);
        if (!set) {
          set = new Set();
          partial.set(succ.node, set);
        }
        set.add(node);
      }
      partials.push(partial);
    }

    return new ReverseIndex(mergePartials(partials));
  }

  /** Predecessors of `node`; empty when nothing links to it. */
  predecessors(node: string): ReadonlySet<string> {
    return this.preds.get(node) ?? EMPTY;
  }

  /** True when at least one article links to `node`. */
  has(node: string): boolean {
    return this.preds.has(node);
  }

  /** Number of nodes with at least one predecessor. */
  get size(): number {
    return this.preds.size;
  }

  /** Total memberships; equals the store's resolved edge count. */
  get edgeCount(): number {
    let n = 0;
    for (const set of this.preds.values()) n += set.size;
    return n;
  }

  nodes(): IterableIterator<string> {
    return this.preds.keys();
  }
}

function mergePartials(partials: Map<string, Set<string>>[]): Map<string, Set<string>> {
  const merged = new Map<string, Set<string>>();
  for (const partial of partials) {
    for (const [node, set] of partial) {
      const existing = merged.get(node);
      if (!existing) {
        merged.set(node, set);
        continue;
      }
      for (const p of set) existing.add(p);
    }
  }
  return merged;
}
