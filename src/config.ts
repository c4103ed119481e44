/**
 * Runtime configuration, read from the environment.
 *
 *   EDGES_DIR             directory of edges_*.json shards (default: cache/edges,
 *                         relative paths resolve against the working directory)
 *   TARGET_NODE           article every path is measured against (default: Philosophy)
 *   PRECOMPUTE_DISTANCES  "1" or "true" to build the Distance Table at startup
 *   REVERSE_PARTITIONS    build the reverse index in N key-range partitions (default: 1)
 */

import path from 'path';
import { z } from 'zod';
import { DEFAULT_TARGET } from './pathfollower.js';

const DEFAULT_EDGES_DIR = path.join('cache', 'edges');

export interface GraphConfig {
  edgesDir: string;
  target: string;
  precomputeDistances: boolean;
  reversePartitions: number;
}

const EnvSchema = z.object({
  EDGES_DIR: z.string().min(1).optional(),
  TARGET_NODE: z.string().min(1).optional(),
  PRECOMPUTE_DISTANCES: z.string().optional(),
  REVERSE_PARTITIONS: z.coerce.number().int().min(1).optional(),
});

export function readConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): GraphConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid environment: ${issue?.path.join('.') ?? ''} ${issue?.message ?? ''}`.trim());
  }
  const vars = parsed.data;
  const edgesDir = vars.EDGES_DIR ?? DEFAULT_EDGES_DIR;

  return {
    edgesDir: path.isAbsolute(edgesDir) ? edgesDir : path.join(cwd, edgesDir),
    target: vars.TARGET_NODE ?? DEFAULT_TARGET,
    precomputeDistances: ['1', 'true'].includes((vars.PRECOMPUTE_DISTANCES ?? '').toLowerCase()),
    reversePartitions: vars.REVERSE_PARTITIONS ?? 1,
  };
}
