/**
 * GraphContext — the one object that owns a loaded graph and everything
 * derived from it.
 *
 * Callers construct it explicitly from an EdgeStore and pass it to whatever
 * needs it (the MCP server, scripts, tests). Nothing here is module-level
 * state, so any number of independent graphs can coexist.
 */

import { type EdgeStore } from './edgestore.js';
import { ReverseIndex } from './reverseindex.js';
import { DEFAULT_TARGET } from './pathfollower.js';
import {
  computeDistances,
  type ComputeOptions,
  type DistanceComputation,
  type GraphView,
  type LayerReport,
  type RandomSource,
} from './distance.js';
import { computeReach, type ReachReport } from './reach.js';

export interface GraphContextOptions {
  target?: string;
  random?: RandomSource;
  /** Build the reverse index in this many key-range partitions. */
  partitions?: number;
  /** Called for every BFS layer of every distance computation. */
  onLayer?: (report: LayerReport) => void;
}

interface SharedRun {
  promise: Promise<DistanceComputation>;
  listeners: Set<(report: LayerReport) => void>;
}

export class GraphContext {
  readonly reverse: ReverseIndex;
  readonly target: string;
  readonly random: RandomSource;
  private readonly onLayer?: (report: LayerReport) => void;

  private shared: SharedRun | null = null;
  private latest: DistanceComputation | null = null;
  private reach: ReachReport | null = null;

  constructor(readonly store: EdgeStore, options: GraphContextOptions = {}) {
    this.target = options.target ?? DEFAULT_TARGET;
    this.random = options.random ?? Math.random;
    this.onLayer = options.onLayer;
    const partitions = options.partitions ?? 1;
    this.reverse = partitions > 1
      ? ReverseIndex.buildPartitioned(store, partitions)
      : ReverseIndex.build(store);
  }

  /**
   * The full distance computation, run once and shared by every caller
   * that passes no signal. Callers that join a shared run in progress get
   * its remaining layers through their own `onLayer`.
   *
   * A caller with a signal gets a run of its own, so aborting it leaves
   * every other caller's result complete. An aborted run is still reported
   * by `distances` until a complete one replaces it, and is never reused.
   */
  ensureDistances(options: ComputeOptions = {}): Promise<DistanceComputation> {
    if (this.latest?.complete) return Promise.resolve(this.latest);
    if (options.signal) return this.run(options.signal, options.onLayer);

    if (this.shared) {
      if (options.onLayer) this.shared.listeners.add(options.onLayer);
      return this.shared.promise;
    }

    const listeners = new Set<(report: LayerReport) => void>();
    if (options.onLayer) listeners.add(options.onLayer);
    const promise = this.run(undefined, report => {
      for (const listener of listeners) listener(report);
    }).finally(() => {
      this.shared = null;
    });
    this.shared = { promise, listeners };
    return promise;
  }

  private async run(
    signal: AbortSignal | undefined,
    onLayer?: (report: LayerReport) => void,
  ): Promise<DistanceComputation> {
    const result = await computeDistances(this.store, this.reverse, this.target, {
      signal,
      onLayer: report => {
        this.onLayer?.(report);
        onLayer?.(report);
      },
    });
    if (!this.latest?.complete) this.latest = result;
    return result;
  }

  /** Most recent distance computation, complete or not, without starting one. */
  get distances(): DistanceComputation | undefined {
    return this.latest ?? undefined;
  }

  /** Store, reverse index and (when available) the complete Distance Table. */
  view(): GraphView {
    const table = this.latest?.complete ? this.latest.table : undefined;
    return { store: this.store, reverse: this.reverse, table };
  }

  /** Reach counts and terminal cycles, computed on first use. */
  reachReport(): ReachReport {
    if (!this.reach) this.reach = computeReach(this.store, this.reverse);
    return this.reach;
  }

  /** True when `node` is a key in the store or the successor of one. */
  knows(node: string): boolean {
    return this.store.has(node) || this.reverse.has(node) || node === this.target;
  }
}
