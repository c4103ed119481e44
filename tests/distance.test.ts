/**
 * Distance engine tests — layered BFS, coverage, cancellation,
 * navigation and sampling.
 */

import { EdgeStore } from '../src/edgestore.js';
import { ReverseIndex } from '../src/reverseindex.js';
import { hopsToTarget } from '../src/pathfollower.js';
import {
  DistanceTable,
  computeDistances,
  computeDistancesSync,
  sampleAtDistance,
  step,
  stepAway,
  stepToward,
  type LayerReport,
} from '../src/distance.js';
import { mulberry32, sequence } from './test-utils.js';

function graph(record: Record<string, string | null>) {
  const store = EdgeStore.fromRecord(record);
  return { store, reverse: ReverseIndex.build(store) };
}

function tableOf(table: DistanceTable): Record<string, number> {
  return Object.fromEntries(table.entries());
}

describe('DistanceTable', () => {
  test('is append-only', () => {
    const table = new DistanceTable();
    table.assign('A', 1);
    expect(() => table.assign('A', 2)).toThrow('Distance for "A" is already assigned (1)');
    expect(table.get('A')).toBe(1);
  });

  test('rejects negative and fractional distances', () => {
    const table = new DistanceTable();
    expect(() => table.assign('A', -1)).toThrow(RangeError);
    expect(() => table.assign('B', 0.5)).toThrow(RangeError);
    expect(table.size).toBe(0);
  });

  test('keeps an inverted index by distance', () => {
    const table = new DistanceTable();
    table.assign('T', 0);
    table.assign('X', 1);
    table.assign('Y', 1);
    table.assign('Z', 3);

    expect(table.bucket(1)).toEqual(['X', 'Y']);
    expect(table.bucket(2)).toEqual([]);
    expect(table.histogram()).toEqual([[0, 1], [1, 2], [3, 1]]);
    expect(table.maxDistance).toBe(3);
  });
});

describe('computeDistancesSync', () => {
  test('coverage is 0.6 when 3 of 5 nodes reach the target', () => {
    const { store, reverse } = graph({ T: null, A: 'T', B: 'A', C: null, D: 'C' });

    const result = computeDistancesSync(store, reverse, 'T');
    expect(tableOf(result.table)).toEqual({ T: 0, A: 1, B: 2 });
    expect(result.coverage).toBe(0.6);
    expect(result.layers).toEqual([1, 1, 1]);
    expect(result.complete).toBe(true);
  });

  test('a cycle through the target gives the target a nonzero distance', () => {
    const { store, reverse } = graph({ T: 'X', X: 'T' });

    const result = computeDistancesSync(store, reverse, 'T');
    expect(result.table.get('T')).toBe(2);
    expect(result.table.get('X')).toBe(1);
    expect(result.layers).toEqual([1, 1]);
  });

  test('a target linking to itself sits at distance 1', () => {
    const { store, reverse } = graph({ T: 'T', A: 'T' });

    const result = computeDistancesSync(store, reverse, 'T');
    expect(tableOf(result.table)).toEqual({ T: 1, A: 1 });
  });

  test('a target with no entry of its own still anchors the search', () => {
    const { store, reverse } = graph({ A: 'T', B: 'A' });

    const result = computeDistancesSync(store, reverse, 'T');
    expect(tableOf(result.table)).toEqual({ T: 0, A: 1, B: 2 });
    expect(result.reached).toBe(2);
    expect(result.coverage).toBe(1);
  });

  test('terminates on cycles that never reach the target', () => {
    const { store, reverse } = graph({ T: null, A: 'B', B: 'C', C: 'A', D: 'A', E: 'T' });

    const result = computeDistancesSync(store, reverse, 'T');
    expect(tableOf(result.table)).toEqual({ T: 0, E: 1 });
  });

  test('matches an independent walk for every node of a random graph', () => {
    const rand = mulberry32(1234);
    const n = 400;
    const record: Record<string, string | null> = { T: null };
    for (let i = 0; i < n; i++) {
      const r = rand();
      record[`N${i}`] = r < 0.05 ? null : r < 0.25 ? 'T' : `N${Math.floor(rand() * n)}`;
    }
    const { store, reverse } = graph(record);

    const result = computeDistancesSync(store, reverse, 'T');

    let reached = 0;
    for (const node of store.nodes()) {
      if (node === 'T') continue;
      const hops = hopsToTarget(store, node, 'T');
      expect(result.table.get(node)).toBe(hops);
      if (hops !== undefined) reached++;
    }
    expect(result.table.size).toBe(reached + 1);
    expect(result.layers.reduce((a, b) => a + b, 0)).toBe(result.table.size);
  });

  test('leaves the reverse index intact for repeated runs', () => {
    const { store, reverse } = graph({ T: null, A: 'T', B: 'A', C: 'A' });

    const first = computeDistancesSync(store, reverse, 'T');
    const second = computeDistancesSync(store, reverse, 'T');
    expect(tableOf(second.table)).toEqual(tableOf(first.table));
    expect(reverse.edgeCount).toBe(3);
  });

  test('reports each non-empty layer', () => {
    const { store, reverse } = graph({ T: null, A: 'T', B: 'T', C: 'A' });
    const reports: LayerReport[] = [];

    computeDistancesSync(store, reverse, 'T', r => reports.push(r));
    expect(reports.map(r => [r.depth, r.size])).toEqual([[0, 1], [1, 2], [2, 1]]);
  });
});

describe('computeDistances', () => {
  const chain = { T: null, A: 'T', B: 'A', C: 'B' };

  test('produces the same table as the synchronous run', async () => {
    const { store, reverse } = graph(chain);

    const result = await computeDistances(store, reverse, 'T');
    expect(result.complete).toBe(true);
    expect(tableOf(result.table)).toEqual({ T: 0, A: 1, B: 2, C: 3 });
    expect(result.coverage).toBe(1);
  });

  test('stops between layers when aborted, leaving a valid partial table', async () => {
    const { store, reverse } = graph(chain);
    const controller = new AbortController();

    const result = await computeDistances(store, reverse, 'T', {
      signal: controller.signal,
      onLayer: r => { if (r.depth === 1) controller.abort(); },
    });

    expect(result.complete).toBe(false);
    expect(tableOf(result.table)).toEqual({ A: 1 });
    expect(result.layers).toEqual([1, 1]);
    expect(result.coverage).toBe(0.25);
  });

  test('an already-aborted signal stops after the seed layer', async () => {
    const { store, reverse } = graph(chain);
    const controller = new AbortController();
    controller.abort();

    const result = await computeDistances(store, reverse, 'T', { signal: controller.signal });
    expect(result.complete).toBe(false);
    expect(result.table.size).toBe(0);
    expect(result.table.has('T')).toBe(false);
    expect(result.reached).toBe(0);
    expect(result.layers).toEqual([1]);
  });
});

describe('navigation', () => {
  const record = { T: null, X: 'T', Y: 'T', Z: 'T', W: 'X', Dead: '' };

  test('toward follows the first link and reports the distance when known', () => {
    const { store, reverse } = graph(record);
    const { table } = computeDistancesSync(store, reverse, 'T');

    expect(stepToward({ store, reverse, table }, 'W')).toEqual({ ok: true, node: 'X', distance: 1, choices: 1 });
    expect(stepToward({ store, reverse }, 'W')).toEqual({ ok: true, node: 'X', distance: undefined, choices: 1 });
  });

  test('toward reports unresolved and unknown nodes', () => {
    const { store, reverse } = graph(record);

    expect(stepToward({ store, reverse }, 'T')).toEqual({ ok: false, error: 'UNRESOLVED_SUCCESSOR' });
    expect(stepToward({ store, reverse }, 'Dead')).toEqual({ ok: false, error: 'UNRESOLVED_SUCCESSOR' });
    expect(stepToward({ store, reverse }, 'Nobody')).toEqual({ ok: false, error: 'UNKNOWN_NODE' });
  });

  test('away picks among the predecessors', () => {
    const { store, reverse } = graph(record);

    expect(stepAway({ store, reverse }, 'T', { random: sequence(0) })).toEqual({
      ok: true, node: 'X', distance: undefined, choices: 3,
    });
    expect(stepAway({ store, reverse }, 'T', { random: sequence(0.99) })).toEqual({
      ok: true, node: 'Z', distance: undefined, choices: 3,
    });
  });

  test('away can move to a named predecessor', () => {
    const { store, reverse } = graph(record);

    expect(step({ store, reverse }, 'T', 'away', { via: 'Y' })).toEqual({
      ok: true, node: 'Y', distance: undefined, choices: 3,
    });
    expect(step({ store, reverse }, 'T', 'away', { via: 'W' })).toEqual({ ok: false, error: 'NOT_A_PREDECESSOR' });
  });

  test('away from a node nothing links to reports no predecessors', () => {
    const { store, reverse } = graph(record);

    expect(step({ store, reverse }, 'W', 'away')).toEqual({ ok: false, error: 'NO_PREDECESSORS' });
    expect(step({ store, reverse }, 'Nobody', 'away')).toEqual({ ok: false, error: 'UNKNOWN_NODE' });
  });

  test('back and forth does not disturb later distance queries', () => {
    const { store, reverse } = graph(record);
    const { table } = computeDistancesSync(store, reverse, 'T');
    const view = { store, reverse, table };

    const away = step(view, 'X', 'away', { via: 'W' });
    expect(away).toEqual({ ok: true, node: 'W', distance: 2, choices: 1 });
    const back = step(view, 'W', 'toward');
    expect(back).toEqual({ ok: true, node: 'X', distance: 1, choices: 1 });
    expect(step(view, 'X', 'away', { via: 'W' })).toEqual(away);
    expect(table.size).toBe(5);
  });
});

describe('sampleAtDistance', () => {
  const { store, reverse } = graph({ T: null, X: 'T', Y: 'T', Z: 'T' });
  const { table } = computeDistancesSync(store, reverse, 'T');

  test('returns a member of the requested bucket', () => {
    expect(sampleAtDistance(table, 1, sequence(0))).toEqual({ ok: true, node: 'X', bucketSize: 3 });
    expect(sampleAtDistance(table, 1, sequence(0.5))).toEqual({ ok: true, node: 'Y', bucketSize: 3 });
    expect(sampleAtDistance(table, 1, sequence(0.999))).toEqual({ ok: true, node: 'Z', bucketSize: 3 });

    for (let i = 0; i < 50; i++) {
      const sample = sampleAtDistance(table, 1);
      expect(sample.ok).toBe(true);
      if (sample.ok) expect(['X', 'Y', 'Z']).toContain(sample.node);
    }
  });

  test('an empty bucket is a result, not an exception', () => {
    expect(sampleAtDistance(table, 2)).toEqual({ ok: false, error: 'EMPTY_BUCKET' });
    expect(sampleAtDistance(table, -1)).toEqual({ ok: false, error: 'EMPTY_BUCKET' });
    expect(sampleAtDistance(table, 0.5)).toEqual({ ok: false, error: 'EMPTY_BUCKET' });
  });
});
