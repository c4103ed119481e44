/**
 * Edge store — the forward half of the first-link graph.
 *
 * Every article maps to at most one successor: the first qualifying link
 * on its page. Articles whose first link could not be resolved upstream map
 * to an explicit `unresolved` variant rather than a sentinel string, so an
 * empty title can never be confused with "no link".
 *
 * Stores are assembled by an EdgeStoreBuilder (one shard at a time) and
 * are read-only once built.
 */

export type Successor =
  | { kind: 'resolved'; node: string }
  | { kind: 'unresolved' };

export const UNRESOLVED: Successor = Object.freeze({ kind: 'unresolved' });

export function resolved(node: string): Successor {
  return { kind: 'resolved', node };
}

/** Thrown when two shards disagree about a node's successor. */
export class EdgeConflictError extends Error {
  constructor(
    readonly node: string,
    readonly existing: Successor,
    readonly incoming: Successor,
  ) {
    super(`Conflicting successors for "${node}": ${describe(existing)} vs ${describe(incoming)}`);
    this.name = 'EdgeConflictError';
  }
}

function describe(s: Successor): string {
  return s.kind === 'resolved' ? `"${s.node}"` : '(unresolved)';
}

function sameSuccessor(a: Successor, b: Successor): boolean {
  if (a.kind === 'unresolved' || b.kind === 'unresolved') return a.kind === b.kind;
  return a.node === b.node;
}

export class EdgeStore {
  private readonly edges: ReadonlyMap<string, Successor>;
  private readonly resolvedCount: number;

  constructor(edges: Map<string, Successor>) {
    this.edges = edges;
    let n = 0;
    for (const s of edges.values()) {
      if (s.kind === 'resolved') n++;
    }
    this.resolvedCount = n;
  }

  /**
   * Convenience constructor for small in-memory graphs. `null` and `""`
   * both mean the node has no resolved successor.
   */
  static fromRecord(record: Record<string, string | null>): EdgeStore {
    const builder = new EdgeStoreBuilder();
    builder.merge(Object.entries(record));
    return builder.build();
  }

  /** Number of nodes with an entry (resolved or not). */
  get size(): number {
    return this.edges.size;
  }

  get resolvedEdges(): number {
    return this.resolvedCount;
  }

  get unresolvedEdges(): number {
    return this.edges.size - this.resolvedCount;
  }

  has(node: string): boolean {
    return this.edges.has(node);
  }

  /** Successor of `node`, or undefined when the node is not in the store. */
  get(node: string): Successor | undefined {
    return this.edges.get(node);
  }

  /** Resolved successor title, or undefined for unknown and unresolved nodes. */
  next(node: string): string | undefined {
    const s = this.edges.get(node);
    return s?.kind === 'resolved' ? s.node : undefined;
  }

  nodes(): IterableIterator<string> {
    return this.edges.keys();
  }

  entries(): IterableIterator<[string, Successor]> {
    return this.edges.entries();
  }
}

/**
 * Accumulates shards into a single mapping. The same key may appear in
 * several shards as long as every occurrence agrees.
 */
export class EdgeStoreBuilder {
  private edges: Map<string, Successor> | null = new Map();

  /**
   * Merge raw `title → successor` pairs. An empty string or null successor
   * is recorded as unresolved.
   *
   * @returns Number of new keys added by this shard.
   */
  merge(pairs: Iterable<readonly [string, string | null]>): number {
    const edges = this.requireOpen();
    let added = 0;
    for (const [node, raw] of pairs) {
      const incoming = raw === null || raw === '' ? UNRESOLVED : resolved(raw);
      const existing = edges.get(node);
      if (existing) {
        if (!sameSuccessor(existing, incoming)) {
          throw new EdgeConflictError(node, existing, incoming);
        }
        continue;
      }
      edges.set(node, incoming);
      added++;
    }
    return added;
  }

  get size(): number {
    return this.requireOpen().size;
  }

  /** Freeze the accumulated mapping. The builder cannot be reused. */
  build(): EdgeStore {
    const edges = this.requireOpen();
    this.edges = null;
    return new EdgeStore(edges);
  }

  private requireOpen(): Map<string, Successor> {
    if (!this.edges) throw new Error('EdgeStoreBuilder has already been built');
    return this.edges;
  }
}
