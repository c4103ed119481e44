/**
 * Path following — repeatedly take the first link until the walk reaches
 * the target, revisits an article, or runs out of links.
 */

import { type EdgeStore } from './edgestore.js';

export const DEFAULT_TARGET = 'Philosophy';

export type DeadEndCause = 'UNKNOWN_NODE' | 'UNRESOLVED_SUCCESSOR';

export type PathResult =
  | { classification: 'REACHED_TARGET'; path: string[] }
  | { classification: 'CYCLE'; path: string[]; repeated: string }
  | { classification: 'DEAD_END'; path: string[]; cause: DeadEndCause };

/**
 * Walk successors from `start`.
 *
 * The returned path always begins with `start`. On REACHED_TARGET it ends
 * with the target; on CYCLE it ends with the repeated article so the loop
 * is visible; on DEAD_END it ends with the last article that had no
 * resolved successor. A start that is not in the store is a DEAD_END of
 * length one with cause UNKNOWN_NODE.
 */
export function followPath(store: EdgeStore, start: string, target: string = DEFAULT_TARGET): PathResult {
  if (start === target) {
    return { classification: 'REACHED_TARGET', path: [start] };
  }
  if (!store.has(start)) {
    return { classification: 'DEAD_END', path: [start], cause: 'UNKNOWN_NODE' };
  }

  const path = [start];
  const visited = new Set<string>(path);
  let current = start;

  // Each iteration adds a node not yet in `visited`, so the loop runs at
  // most once per distinct node before one of the exits fires.
  while (true) {
    const next = store.next(current);
    if (next === undefined) {
      return { classification: 'DEAD_END', path, cause: 'UNRESOLVED_SUCCESSOR' };
    }

    path.push(next);
    if (next === target) {
      return { classification: 'REACHED_TARGET', path };
    }
    if (visited.has(next)) {
      return { classification: 'CYCLE', path, repeated: next };
    }

    visited.add(next);
    current = next;
  }
}

/**
 * Number of links followed to reach the target, or undefined when the walk
 * cycles or dead-ends.
 */
export function hopsToTarget(store: EdgeStore, start: string, target: string = DEFAULT_TARGET): number | undefined {
  const result = followPath(store, start, target);
  return result.classification === 'REACHED_TARGET' ? result.path.length - 1 : undefined;
}
