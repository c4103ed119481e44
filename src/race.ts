/**
 * Race simulator — several articles follow their first links in lock-step
 * and the first to land on the target wins.
 *
 * Racers move one edge per round using the edge store directly; paths are
 * never materialised up front. A racer that lands on an article it has
 * already visited is looping and can no longer win; one whose article has
 * no resolved link is stalled. The race ends on the first round in which
 * anyone reaches the target (every racer there that round wins), or when
 * nobody is left running.
 *
 * Each running racer adds an article it has never visited to its history
 * every round, so a race cannot outlast the number of distinct articles.
 */

import { type EdgeStore } from './edgestore.js';
import { DEFAULT_TARGET } from './pathfollower.js';
import { type RandomSource } from './distance.js';

export type RacerStatus = 'running' | 'finished' | 'looping' | 'stalled';

export interface RacerSnapshot {
  start: string;
  position: string;
  steps: number;
  status: RacerStatus;
}

export interface RaceRound {
  /** 0 is the starting line. */
  round: number;
  racers: RacerSnapshot[];
}

export type RaceResult =
  | { outcome: 'WINNER'; winners: string[]; rounds: number; trace: RaceRound[] }
  | { outcome: 'NO_WINNER'; rounds: number; trace: RaceRound[] };

interface Racer {
  start: string;
  position: string;
  steps: number;
  status: RacerStatus;
  history: Set<string>;
}

export class Race {
  private readonly racers: Racer[];
  private readonly rounds: RaceRound[] = [];
  private round = 0;

  constructor(
    private readonly store: EdgeStore,
    starts: readonly string[],
    private readonly target: string = DEFAULT_TARGET,
  ) {
    if (starts.length === 0) {
      throw new RangeError('A race needs at least one start article');
    }
    if (new Set(starts).size !== starts.length) {
      throw new RangeError('Race start articles must be distinct');
    }

    this.racers = starts.map((start): Racer => ({
      start,
      position: start,
      steps: 0,
      status: start === target ? 'finished' : 'running',
      history: new Set([start]),
    }));
    this.rounds.push(this.snapshot());
  }

  /** Starts of every racer currently on the target. */
  get winners(): string[] {
    return this.racers.filter(r => r.status === 'finished').map(r => r.start);
  }

  get done(): boolean {
    return this.winners.length > 0 || !this.racers.some(r => r.status === 'running');
  }

  get trace(): readonly RaceRound[] {
    return this.rounds;
  }

  /**
   * Advance every running racer by one link.
   *
   * @returns The snapshot for the new round, or undefined if the race was
   *          already over.
   */
  advance(): RaceRound | undefined {
    if (this.done) return undefined;

    this.round++;
    for (const racer of this.racers) {
      if (racer.status !== 'running') continue;

      const next = this.store.next(racer.position);
      if (next === undefined) {
        racer.status = 'stalled';
        continue;
      }

      racer.position = next;
      racer.steps++;
      if (next === this.target) {
        racer.status = 'finished';
      } else if (racer.history.has(next)) {
        racer.status = 'looping';
      } else {
        racer.history.add(next);
      }
    }

    const snap = this.snapshot();
    this.rounds.push(snap);
    return snap;
  }

  /** Run to completion. */
  run(): RaceResult {
    while (!this.done) this.advance();
    return this.result();
  }

  result(): RaceResult {
    const trace = [...this.rounds];
    const winners = this.winners;
    if (winners.length > 0) {
      return { outcome: 'WINNER', winners, rounds: this.round, trace };
    }
    return { outcome: 'NO_WINNER', rounds: this.round, trace };
  }

  private snapshot(): RaceRound {
    return {
      round: this.round,
      racers: this.racers.map(({ start, position, steps, status }) => ({ start, position, steps, status })),
    };
  }
}

export function race(store: EdgeStore, starts: readonly string[], target: string = DEFAULT_TARGET): RaceResult {
  return new Race(store, starts, target).run();
}

/**
 * Pick `count` distinct articles from the store to race.
 * Partial Fisher–Yates over the key list.
 */
export function pickRacers(store: EdgeStore, count: number, random: RandomSource = Math.random): string[] {
  if (!Number.isInteger(count) || count < 1) {
    throw new RangeError(`Racer count must be a positive integer, got ${count}`);
  }
  const nodes = Array.from(store.nodes());
  if (count > nodes.length) {
    throw new RangeError(`Cannot pick ${count} racers from ${nodes.length} articles`);
  }

  for (let i = 0; i < count; i++) {
    const j = i + Math.min(nodes.length - i - 1, Math.floor(random() * (nodes.length - i)));
    const tmp = nodes[i];
    nodes[i] = nodes[j];
    nodes[j] = tmp;
  }
  return nodes.slice(0, count);
}
