#!/usr/bin/env node
/**
 * Print the breadth-first layers from the target, the resulting coverage,
 * and the articles most other articles drain through.
 *
 * Usage: npx tsx scripts/layer-report.ts [edges-dir] [target]
 */
import * as path from 'path';
import { loadEdgeShards } from '../src/edgeload.js';
import { GraphContext } from '../src/context.js';
import { DEFAULT_TARGET } from '../src/pathfollower.js';
import { topReached } from '../src/reach.js';

const edgesDir = path.resolve(process.argv[2] || path.join('cache', 'edges'));
const target = process.argv[3] || DEFAULT_TARGET;

async function report() {
  console.log(`Edges:  ${edgesDir}`);
  console.log(`Target: ${target}`);
  console.log();

  const { store, shards } = loadEdgeShards(edgesDir);
  console.log(`Loaded ${store.size} articles from ${shards.length} shards`);

  const context = new GraphContext(store, {
    target,
    onLayer: layer => {
      console.log(`Batch ${String(layer.depth).padStart(3)} (${String(layer.size).padStart(7)} articles) completed in ${(layer.elapsedMs / 1000).toFixed(4)}s`);
    },
  });

  const result = await context.ensureDistances();
  console.log();
  console.log(`Parsed ${result.table.size} articles out of ${store.size} total (${(result.coverage * 100).toFixed(4)}% of articles link to ${target}).`);

  const reach = context.reachReport();
  console.log();
  console.log(`Terminal cycles: ${reach.cycles.length}`);
  console.log('Most reached:');
  for (const { node, reach: count } of topReached(reach, 10)) {
    console.log(`  ${count.toString().padStart(9)}  ${node}`);
  }
}

report().catch(err => {
  console.error('Report failed:', err);
  process.exit(1);
});
