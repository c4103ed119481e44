/**
 * edgeload.ts — Assemble an EdgeStore from a directory of shard files.
 *
 * Shards are JSON objects named `edges_<suffix>.json` (the scraper writes
 * one per initial letter plus `num` and `other`), each mapping an article
 * title to the title of its first link. An empty string or null marks an
 * article whose first link could not be resolved.
 *
 * Any problem here is fatal: the graph is either loaded whole or not at all.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { EdgeConflictError, EdgeStoreBuilder, type EdgeStore } from './edgestore.js';

const SHARD_PATTERN = /^edges_.+\.json$/;

const ShardSchema = z.record(z.string(), z.string().nullable());

export class GraphLoadError extends Error {
  constructor(message: string, readonly file?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GraphLoadError';
  }
}

export interface ShardSummary {
  file: string;
  /** Keys in the shard. */
  entries: number;
  /** Keys not already supplied by an earlier shard. */
  added: number;
}

export interface LoadResult {
  store: EdgeStore;
  shards: ShardSummary[];
}

/** Shard file names in `dir`, sorted. */
export function listShards(dir: string): string[] {
  let names: string[];
  try {
    names = fs.readdirSync(dir);
  } catch (err) {
    throw new GraphLoadError(`Cannot read edge directory ${dir}: ${errorMessage(err)}`, dir, { cause: err });
  }
  return names.filter(n => SHARD_PATTERN.test(n)).sort();
}

/** Parse and validate one shard. */
export function readShard(file: string): Record<string, string | null> {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (err) {
    throw new GraphLoadError(`Unreadable shard ${file}: ${errorMessage(err)}`, file, { cause: err });
  }

  const parsed = ShardSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at "${issue.path.join('.')}"` : '';
    throw new GraphLoadError(`Malformed shard ${file}${where}: ${issue?.message ?? 'invalid'}`, file);
  }
  return parsed.data;
}

/**
 * Load every shard in `dir` into a single store.
 *
 * @param onShard Called after each shard is merged (for progress logging).
 */
export function loadEdgeShards(dir: string, onShard?: (summary: ShardSummary) => void): LoadResult {
  const files = listShards(dir);
  if (files.length === 0) {
    throw new GraphLoadError(`No edges_*.json shards found in ${dir}`, dir);
  }

  const builder = new EdgeStoreBuilder();
  const shards: ShardSummary[] = [];

  for (const name of files) {
    const file = path.join(dir, name);
    const data = readShard(file);
    let added: number;
    try {
      added = builder.merge(Object.entries(data));
    } catch (err) {
      if (err instanceof EdgeConflictError) {
        throw new GraphLoadError(`${err.message} (in ${file})`, file, { cause: err });
      }
      throw err;
    }
    const summary = { file: name, entries: Object.keys(data).length, added };
    shards.push(summary);
    onShard?.(summary);
  }

  return { store: builder.build(), shards };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
