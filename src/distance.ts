/**
 * Distance engine — how many first-link hops separate every article from
 * the target.
 *
 * The computation is a layered breadth-first expansion over the reverse
 * index, starting at the target:
 *
 *   layer 0     = { target }
 *   layer k + 1 = ⋃ predecessors(n) for n in layer k, minus every node seen
 *                 in any earlier layer
 *
 * The `seen` set is global across layers and kept apart from the Distance
 * Table. The graph is full of cycles, so a node can turn up as a
 * predecessor again and again; only the global set stops the expansion.
 * Keeping it separate from the table (and never consuming the reverse
 * index) leaves both intact for navigation afterwards.
 *
 * Layers are produced whole by a generator. The async driver yields to the
 * event loop between layers and checks an AbortSignal there, so a caller
 * can abandon a multi-minute run; the table it leaves behind is valid,
 * just incomplete. A partial table has no entry for the target itself:
 * that entry is only known once the expansion has run to the end.
 *
 * The target's own entry is the length of the shortest cycle through it
 * when one exists (it is rediscovered as a predecessor), and 0 otherwise.
 */

import { setImmediate as yieldToLoop } from 'timers/promises';
import { type EdgeStore } from './edgestore.js';
import { type ReverseIndex } from './reverseindex.js';
import { DEFAULT_TARGET } from './pathfollower.js';

export type RandomSource = () => number;

// ─── Distance Table ─────────────────────────────────────────────────

/**
 * Append-only node → distance mapping with an inverted distance → nodes
 * index maintained alongside it.
 */
export class DistanceTable {
  private readonly distances = new Map<string, number>();
  private readonly buckets = new Map<number, string[]>();

  assign(node: string, distance: number): void {
    if (this.distances.has(node)) {
      throw new Error(`Distance for "${node}" is already assigned (${this.distances.get(node)})`);
    }
    if (!Number.isInteger(distance) || distance < 0) {
      throw new RangeError(`Distance must be a non-negative integer, got ${distance}`);
    }
    this.distances.set(node, distance);
    const bucket = this.buckets.get(distance);
    if (bucket) bucket.push(node);
    else this.buckets.set(distance, [node]);
  }

  get(node: string): number | undefined {
    return this.distances.get(node);
  }

  has(node: string): boolean {
    return this.distances.has(node);
  }

  get size(): number {
    return this.distances.size;
  }

  /** Nodes recorded at exactly `distance`, in discovery order. */
  bucket(distance: number): readonly string[] {
    return this.buckets.get(distance) ?? [];
  }

  /** `[distance, count]` pairs in ascending distance order. */
  histogram(): Array<[number, number]> {
    return Array.from(this.buckets, ([d, nodes]): [number, number] => [d, nodes.length])
      .sort((a, b) => a[0] - b[0]);
  }

  get maxDistance(): number | undefined {
    let max: number | undefined;
    for (const d of this.buckets.keys()) {
      if (max === undefined || d > max) max = d;
    }
    return max;
  }

  entries(): IterableIterator<[string, number]> {
    return this.distances.entries();
  }
}

// ─── Layered expansion ──────────────────────────────────────────────

export interface LayerReport {
  depth: number;
  /** Nodes discovered at this depth (the target counts in layer 0). */
  size: number;
  /** Milliseconds spent producing this layer. */
  elapsedMs: number;
}

export interface DistanceComputation {
  target: string;
  table: DistanceTable;
  /** Table entries that are store keys; the target need not be one. */
  reached: number;
  /** Fraction of the store's articles that reach the target. */
  coverage: number;
  /** Layer sizes indexed by depth. */
  layers: number[];
  /** False when the run was aborted between layers. */
  complete: boolean;
}

export interface ComputeOptions {
  signal?: AbortSignal;
  onLayer?: (report: LayerReport) => void;
}

/**
 * Expand from `target` one layer per iteration, recording distances into
 * `table` as nodes are discovered.
 */
export function* expandLayers(
  reverse: ReverseIndex,
  target: string,
  table: DistanceTable,
): Generator<LayerReport, void, void> {
  const seen = new Set<string>([target]);
  let frontier: string[] = [target];
  let depth = 0;
  let targetRecorded = false;

  yield { depth: 0, size: 1, elapsedMs: 0 };

  while (frontier.length > 0) {
    const t0 = performance.now();
    const next: string[] = [];

    for (const node of frontier) {
      for (const pred of reverse.predecessors(node)) {
        if (pred === target) {
          // A cycle runs back through the target. Record its length once,
          // but never expand the target a second time.
          if (!targetRecorded) {
            table.assign(target, depth + 1);
            targetRecorded = true;
          }
          continue;
        }
        if (seen.has(pred)) continue;
        seen.add(pred);
        table.assign(pred, depth + 1);
        next.push(pred);
      }
    }

    depth++;
    frontier = next;
    if (next.length > 0) {
      yield { depth, size: next.length, elapsedMs: performance.now() - t0 };
    }
  }

  if (!targetRecorded) table.assign(target, 0);
}

function finish(
  store: EdgeStore,
  target: string,
  table: DistanceTable,
  layers: number[],
  complete: boolean,
): DistanceComputation {
  // The target need not be a key in the store; only keys count toward coverage.
  let reached = 0;
  for (const [node] of table.entries()) {
    if (store.has(node)) reached++;
  }
  const coverage = store.size === 0 ? 0 : reached / store.size;
  return { target, table, reached, coverage, layers, complete };
}

/** Run the whole expansion without yielding. Suited to small graphs and tests. */
export function computeDistancesSync(
  store: EdgeStore,
  reverse: ReverseIndex,
  target: string = DEFAULT_TARGET,
  onLayer?: (report: LayerReport) => void,
): DistanceComputation {
  const table = new DistanceTable();
  const layers: number[] = [];
  for (const report of expandLayers(reverse, target, table)) {
    layers.push(report.size);
    onLayer?.(report);
  }
  return finish(store, target, table, layers, true);
}

/**
 * Run the expansion, yielding to the event loop between layers. When
 * `options.signal` fires, the run stops at the next layer boundary and
 * resolves with `complete: false`.
 */
export async function computeDistances(
  store: EdgeStore,
  reverse: ReverseIndex,
  target: string = DEFAULT_TARGET,
  options: ComputeOptions = {},
): Promise<DistanceComputation> {
  const table = new DistanceTable();
  const layers: number[] = [];

  for (const report of expandLayers(reverse, target, table)) {
    layers.push(report.size);
    options.onLayer?.(report);
    await yieldToLoop();
    if (options.signal?.aborted) {
      return finish(store, target, table, layers, false);
    }
  }

  return finish(store, target, table, layers, true);
}

// ─── Navigation ─────────────────────────────────────────────────────

export type Direction = 'toward' | 'away';

export type StepError =
  | 'UNKNOWN_NODE'
  | 'UNRESOLVED_SUCCESSOR'
  | 'NO_PREDECESSORS'
  | 'NOT_A_PREDECESSOR';

export type StepResult =
  | {
      ok: true;
      node: string;
      /** Distance of `node` to the target, when a table is available and has it. */
      distance: number | undefined;
      /** How many nodes the step could have chosen from. */
      choices: number;
    }
  | { ok: false; error: StepError };

export interface GraphView {
  store: EdgeStore;
  reverse: ReverseIndex;
  table?: DistanceTable;
}

export interface StepOptions {
  /** For `away`: the predecessor to move to instead of a random one. */
  via?: string;
  random?: RandomSource;
}

function isKnown(graph: GraphView, node: string): boolean {
  return graph.store.has(node) || graph.reverse.has(node);
}

/** One hop along the first link. */
export function stepToward(graph: GraphView, node: string): StepResult {
  if (!isKnown(graph, node)) return { ok: false, error: 'UNKNOWN_NODE' };
  const next = graph.store.next(node);
  if (next === undefined) return { ok: false, error: 'UNRESOLVED_SUCCESSOR' };
  return { ok: true, node: next, distance: graph.table?.get(next), choices: 1 };
}

/** One hop backward, to a random (or the given) article that links here. */
export function stepAway(graph: GraphView, node: string, options: StepOptions = {}): StepResult {
  if (!isKnown(graph, node)) return { ok: false, error: 'UNKNOWN_NODE' };
  const preds = graph.reverse.predecessors(node);
  if (preds.size === 0) return { ok: false, error: 'NO_PREDECESSORS' };

  let chosen: string | undefined;
  if (options.via !== undefined) {
    if (!preds.has(options.via)) return { ok: false, error: 'NOT_A_PREDECESSOR' };
    chosen = options.via;
  } else {
    chosen = pickFromSet(preds, options.random ?? Math.random);
  }
  if (chosen === undefined) return { ok: false, error: 'NO_PREDECESSORS' };

  return { ok: true, node: chosen, distance: graph.table?.get(chosen), choices: preds.size };
}

export function step(graph: GraphView, node: string, direction: Direction, options: StepOptions = {}): StepResult {
  return direction === 'toward' ? stepToward(graph, node) : stepAway(graph, node, options);
}

function pickFromSet(set: ReadonlySet<string>, random: RandomSource): string | undefined {
  let k = Math.min(set.size - 1, Math.floor(random() * set.size));
  for (const item of set) {
    if (k-- === 0) return item;
  }
  return undefined;
}

// ─── Sampling ───────────────────────────────────────────────────────

export type SampleResult =
  | { ok: true; node: string; bucketSize: number }
  | { ok: false; error: 'EMPTY_BUCKET' };

/** A uniformly random node whose recorded distance is exactly `distance`. */
export function sampleAtDistance(
  table: DistanceTable,
  distance: number,
  random: RandomSource = Math.random,
): SampleResult {
  const bucket = table.bucket(distance);
  if (bucket.length === 0) return { ok: false, error: 'EMPTY_BUCKET' };
  const idx = Math.min(bucket.length - 1, Math.floor(random() * bucket.length));
  return { ok: true, node: bucket[idx], bucketSize: bucket.length };
}
