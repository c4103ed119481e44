/**
 * Reach statistics — how many articles eventually pass through each
 * article when following first links.
 *
 * Every weakly connected piece of a functional graph is a tree draining
 * into either a dead end or a single cycle. We find the cycles with one
 * forward pass, then accumulate tree counts from the leaves toward the
 * roots in topological order (no recursion; the full graph has millions
 * of nodes and chains thousands long). Every member of a cycle is reached
 * by the whole component, itself included.
 *
 * reach(n) = |{ m : n appears in the walk from m after at least one step }|
 */

import { type EdgeStore } from './edgestore.js';
import { type ReverseIndex } from './reverseindex.js';

export interface ReachReport {
  counts: Map<string, number>;
  /** Terminal cycles, each listed in link order. */
  cycles: string[][];
}

export interface ReachEntry {
  node: string;
  reach: number;
}

const ON_WALK = 1;
const DONE = 2;

/** Every node: store keys plus successors that have no entry of their own. */
function allNodes(store: EdgeStore): Set<string> {
  const nodes = new Set<string>(store.nodes());
  for (const [, succ] of store.entries()) {
    if (succ.kind === 'resolved') nodes.add(succ.node);
  }
  return nodes;
}

export function findCycles(store: EdgeStore): string[][] {
  const state = new Map<string, number>();
  const cycles: string[][] = [];

  for (const start of allNodes(store)) {
    if (state.has(start)) continue;

    const walk: string[] = [];
    const walkIndex = new Map<string, number>();
    let cur: string | undefined = start;

    while (cur !== undefined && !state.has(cur)) {
      state.set(cur, ON_WALK);
      walkIndex.set(cur, walk.length);
      walk.push(cur);
      cur = store.next(cur);
    }

    if (cur !== undefined && state.get(cur) === ON_WALK) {
      const from = walkIndex.get(cur) ?? 0;
      cycles.push(walk.slice(from));
    }
    for (const node of walk) state.set(node, DONE);
  }

  return cycles;
}

export function computeReach(store: EdgeStore, reverse: ReverseIndex): ReachReport {
  const cycles = findCycles(store);
  const onCycle = new Set<string>();
  for (const cycle of cycles) {
    for (const node of cycle) onCycle.add(node);
  }

  const nodes = allNodes(store);
  const acc = new Map<string, number>();
  const pending = new Map<string, number>();
  const queue: string[] = [];

  // Predecessors of a tree node are all tree nodes: anything on a cycle
  // links to the next cycle member.
  for (const node of nodes) {
    acc.set(node, 0);
    if (onCycle.has(node)) continue;
    const indegree = reverse.predecessors(node).size;
    pending.set(node, indegree);
    if (indegree === 0) queue.push(node);
  }

  for (let head = 0; head < queue.length; head++) {
    const node = queue[head];
    const next = store.next(node);
    if (next === undefined) continue;

    acc.set(next, (acc.get(next) ?? 0) + (acc.get(node) ?? 0) + 1);
    if (onCycle.has(next)) continue;

    const left = (pending.get(next) ?? 1) - 1;
    pending.set(next, left);
    if (left === 0) queue.push(next);
  }

  const counts = new Map<string, number>(acc);
  for (const cycle of cycles) {
    let total = 0;
    for (const node of cycle) total += (acc.get(node) ?? 0) + 1;
    for (const node of cycle) counts.set(node, total);
  }

  return { counts, cycles };
}

/** The `limit` most-reached nodes, ties broken by title. */
export function topReached(report: ReachReport, limit: number): ReachEntry[] {
  return Array.from(report.counts, ([node, reach]) => ({ node, reach }))
    .sort((a, b) => b.reach - a.reach || compareTitles(a.node, b.node))
    .slice(0, limit);
}

function compareTitles(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
