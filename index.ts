#!/usr/bin/env node

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createServer } from "./server.js";
import { readConfig } from "./src/config.js";
import { GraphContext } from "./src/context.js";
import { loadEdgeShards } from "./src/edgeload.js";

async function main() {
  const config = readConfig();

  console.error(`Loading edge shards from ${config.edgesDir}`);
  const { store, shards } = loadEdgeShards(config.edgesDir, shard => {
    console.error(`  ${shard.file}: ${shard.entries} entries (${shard.added} new)`);
  });
  console.error(`Loaded ${store.size} articles from ${shards.length} shards (${store.unresolvedEdges} without a resolved link)`);

  const context = new GraphContext(store, {
    target: config.target,
    partitions: config.reversePartitions,
    onLayer: layer => {
      console.error(`Layer ${String(layer.depth).padStart(3)}: ${String(layer.size).padStart(7)} articles (${layer.elapsedMs.toFixed(1)}ms)`);
    },
  });

  if (config.precomputeDistances) {
    const result = await context.ensureDistances();
    console.error(`Reached ${result.table.size} of ${store.size} articles (${(result.coverage * 100).toFixed(4)}% link to ${config.target})`);
  }

  const server = createServer(context);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("Philosophy graph MCP server running on stdio");
}

main().catch((error) => {
  console.error("Fatal error in main():", error);
  process.exit(1);
});
