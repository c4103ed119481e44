import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { type GraphContext } from "./src/context.js";
import { followPath, type PathResult } from "./src/pathfollower.js";
import { sampleAtDistance, step, type StepResult, type SampleResult } from "./src/distance.js";
import { pickRacers, race, type RaceResult } from "./src/race.js";
import { topReached, type ReachEntry } from "./src/reach.js";

export type { PathResult, StepResult, SampleResult, RaceResult, ReachEntry };

export interface PaginatedResult<T> {
  items: T[];
  nextCursor: number | null;
  totalCount: number;
}

export interface DistanceSummary {
  target: string;
  complete: boolean;
  coverage: number;
  reached: number;
  totalNodes: number;
  layers: number[];
  maxDistance: number | null;
}

export type DistanceLookup =
  | { ok: true; node: string; distance: number }
  | { ok: false; node: string; error: "UNKNOWN_NODE" | "DOES_NOT_REACH_TARGET" };

export type ReachLookup =
  | { ok: true; node: string; reach: number }
  | { ok: false; node: string; error: "UNKNOWN_NODE" };

export interface GraphStats {
  target: string;
  nodes: number;
  resolvedEdges: number;
  unresolvedEdges: number;
  linkedTo: number;
  distances: {
    complete: boolean;
    coverage: number;
    maxDistance: number | null;
    histogram: Array<[number, number]>;
  } | null;
}

export const MAX_CHARS = 2048;

function paginateItems<T>(items: T[], cursor: number = 0, maxChars: number = MAX_CHARS): PaginatedResult<T> {
  const result: T[] = [];
  let i = cursor;

  // Overhead of the wrapper: {"items":[],"nextCursor":null,"totalCount":123}
  const wrapperTemplate: PaginatedResult<T> = { items: [], nextCursor: null, totalCount: items.length };
  let charCount = JSON.stringify(wrapperTemplate).length;

  while (i < items.length) {
    const itemJson = JSON.stringify(items[i]);
    const addedChars = itemJson.length + (result.length > 0 ? 1 : 0); // +1 for comma

    // At least one item per page, however large
    if (result.length > 0 && charCount + addedChars > maxChars) {
      break;
    }

    result.push(items[i]);
    charCount += addedChars;
    i++;
  }

  return {
    items: result,
    nextCursor: i < items.length ? i : null,
    totalCount: items.length,
  };
}

// ─── Tool argument schemas ──────────────────────────────────────────

const FollowPathArgs = z.object({ start: z.string() });
const NodeArgs = z.object({ node: z.string() });
const StepArgs = z.object({
  node: z.string(),
  direction: z.enum(["toward", "away"]),
  via: z.string().optional(),
});
const SampleArgs = z.object({ distance: z.number().int() });
const RaceArgs = z.object({
  starts: z.array(z.string()).min(1).optional(),
  count: z.number().int().min(1).optional(),
}).refine(a => (a.starts === undefined) !== (a.count === undefined), {
  message: "Provide exactly one of starts or count",
});
const CursorArgs = z.object({ cursor: z.number().int().min(0).optional() });
const TopArgs = z.object({ limit: z.number().int().min(1).max(100).optional() });
const NoArgs = z.object({});

function parseArgs<T extends z.ZodTypeAny>(schema: T, tool: string, args: unknown): z.output<T> {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join(".") || "(arguments)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid arguments for ${tool}: ${details}`);
  }
  return parsed.data;
}

function textResult(value: unknown) {
  return { content: [{ type: "text" as const, text: JSON.stringify(value) }] };
}

// The GraphQueries class contains all operations the server exposes over a loaded graph
export class GraphQueries {
  constructor(private readonly context: GraphContext) {}

  followPath(start: string): PathResult {
    return followPath(this.context.store, start, this.context.target);
  }

  async computeDistances(): Promise<DistanceSummary> {
    const result = await this.context.ensureDistances();
    return {
      target: result.target,
      complete: result.complete,
      coverage: result.coverage,
      reached: result.reached,
      totalNodes: this.context.store.size,
      layers: result.layers,
      maxDistance: result.table.maxDistance ?? null,
    };
  }

  async getDistance(node: string): Promise<DistanceLookup> {
    const { table } = await this.context.ensureDistances();
    const distance = table.get(node);
    if (distance !== undefined) return { ok: true, node, distance };
    if (!this.context.knows(node)) return { ok: false, node, error: "UNKNOWN_NODE" };
    return { ok: false, node, error: "DOES_NOT_REACH_TARGET" };
  }

  step(node: string, direction: "toward" | "away", via?: string): StepResult {
    return step(this.context.view(), node, direction, { via, random: this.context.random });
  }

  async sampleAtDistance(distance: number): Promise<SampleResult> {
    const { table } = await this.context.ensureDistances();
    return sampleAtDistance(table, distance, this.context.random);
  }

  race(starts: string[] | undefined, count: number | undefined): RaceResult {
    const racers = starts ?? pickRacers(this.context.store, count ?? 2, this.context.random);
    return race(this.context.store, racers, this.context.target);
  }

  getReach(node: string): ReachLookup {
    const reach = this.context.reachReport().counts.get(node);
    if (reach === undefined) return { ok: false, node, error: "UNKNOWN_NODE" };
    return { ok: true, node, reach };
  }

  listCycles(): string[][] {
    return this.context.reachReport().cycles;
  }

  topReached(limit: number): ReachEntry[] {
    return topReached(this.context.reachReport(), limit);
  }

  getStats(): GraphStats {
    const { store, reverse, target } = this.context;
    const latest = this.context.distances;
    return {
      target,
      nodes: store.size,
      resolvedEdges: store.resolvedEdges,
      unresolvedEdges: store.unresolvedEdges,
      linkedTo: reverse.size,
      distances: latest
        ? {
            complete: latest.complete,
            coverage: latest.coverage,
            maxDistance: latest.table.maxDistance ?? null,
            histogram: latest.table.histogram(),
          }
        : null,
    };
  }
}

/**
 * Creates a configured MCP server instance with all tools registered.
 * @param context Loaded graph the tools query
 */
export function createServer(context: GraphContext): Server {
  const queries = new GraphQueries(context);

  const server = new Server({
    name: "philosophy-graph-server",
    version: "0.1.0",
  }, {
    capabilities: {
      tools: {},
    },
  });

server.setRequestHandler(ListToolsRequestSchema, async () => {
  return {
    tools: [
      {
        name: "follow_path",
        description: "Follow first links from an article until it reaches the target, loops, or dead-ends. Returns the path and its classification (REACHED_TARGET, CYCLE, DEAD_END).",
        inputSchema: {
          type: "object",
          properties: {
            start: { type: "string", description: "Exact article title to start from" },
          },
          required: ["start"],
        },
      },
      {
        name: "compute_distances",
        description: "Compute (once) every article's distance to the target by breadth-first search over reverse links. Returns coverage and layer sizes.",
        inputSchema: {
          type: "object",
          properties: {},
        },
      },
      {
        name: "get_distance",
        description: "Number of first-link hops from an article to the target. Computes the distance table on first use.",
        inputSchema: {
          type: "object",
          properties: {
            node: { type: "string", description: "Exact article title" },
          },
          required: ["node"],
        },
      },
      {
        name: "step",
        description: "Move one article toward the target (follow the first link) or away from it (to an article that links here, random unless 'via' is given).",
        inputSchema: {
          type: "object",
          properties: {
            node: { type: "string", description: "Article to step from" },
            direction: { type: "string", enum: ["toward", "away"], description: "toward = follow first link, away = go to a linking article" },
            via: { type: "string", description: "For direction 'away': the linking article to move to" },
          },
          required: ["node", "direction"],
        },
      },
      {
        name: "sample_at_distance",
        description: "A uniformly random article exactly N hops from the target, or EMPTY_BUCKET.",
        inputSchema: {
          type: "object",
          properties: {
            distance: { type: "number", description: "Hop count" },
          },
          required: ["distance"],
        },
      },
      {
        name: "race",
        description: "Race articles toward the target one link per round. Give either explicit starts or a count of random articles. Ties are reported as several winners.",
        inputSchema: {
          type: "object",
          properties: {
            starts: { type: "array", items: { type: "string" }, description: "Distinct article titles to race" },
            count: { type: "number", description: "Number of random articles to race instead" },
          },
        },
      },
      {
        name: "get_reach",
        description: "How many articles eventually pass through the given article when following first links.",
        inputSchema: {
          type: "object",
          properties: {
            node: { type: "string", description: "Exact article title" },
          },
          required: ["node"],
        },
      },
      {
        name: "top_reached",
        description: "Articles that the most other articles eventually pass through.",
        inputSchema: {
          type: "object",
          properties: {
            limit: { type: "number", description: "How many to return (default 10, max 100)" },
          },
        },
      },
      {
        name: "list_cycles",
        description: "Terminal cycles of the first-link graph. Results are paginated (max 2048 chars).",
        inputSchema: {
          type: "object",
          properties: {
            cursor: { type: "number", description: "Cursor for pagination" },
          },
        },
      },
      {
        name: "get_stats",
        description: "Node and edge counts, plus distance coverage once distances have been computed.",
        inputSchema: {
          type: "object",
          properties: {},
        },
      },
    ],
  };
});

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;

  switch (name) {
    case "follow_path": {
      const { start } = parseArgs(FollowPathArgs, name, args);
      return textResult(queries.followPath(start));
    }
    case "compute_distances":
      parseArgs(NoArgs, name, args);
      return textResult(await queries.computeDistances());
    case "get_distance": {
      const { node } = parseArgs(NodeArgs, name, args);
      return textResult(await queries.getDistance(node));
    }
    case "step": {
      const { node, direction, via } = parseArgs(StepArgs, name, args);
      return textResult(queries.step(node, direction, via));
    }
    case "sample_at_distance": {
      const { distance } = parseArgs(SampleArgs, name, args);
      return textResult(await queries.sampleAtDistance(distance));
    }
    case "race": {
      const { starts, count } = parseArgs(RaceArgs, name, args);
      return textResult(queries.race(starts, count));
    }
    case "get_reach": {
      const { node } = parseArgs(NodeArgs, name, args);
      return textResult(queries.getReach(node));
    }
    case "top_reached": {
      const { limit } = parseArgs(TopArgs, name, args);
      return textResult(queries.topReached(limit ?? 10));
    }
    case "list_cycles": {
      const { cursor } = parseArgs(CursorArgs, name, args);
      return textResult(paginateItems(queries.listCycles(), cursor ?? 0));
    }
    case "get_stats":
      parseArgs(NoArgs, name, args);
      return textResult(queries.getStats());
    default:
      throw new Error(`Unknown tool: ${name}`);
  }
});

  return server;
}
