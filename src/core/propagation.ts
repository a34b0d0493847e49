/**
 * Propagation — The engine that runs one generation at a time.
 *
 * A Traversal is the whole mutable state of one pass: its generation id, the
 * work list bucketed by rank, the nodes already queued, deferred actions and
 * the failures collected so far. Nothing about a pass lives on the nodes.
 *
 * Visiting buckets in ascending rank means a node runs only after every
 * upstream that could contribute to it in this generation has run.
 */

import { getPropagationOptions, LOG_PREFIX } from '../config';
import { PropagationError, RunawayPropagationError } from './errors';
import type { NodeFailure } from './errors';
import type { Visitable } from './types';

/** Seeds a fresh traversal, typically by handing a value to a root node */
export type PassStart = (traversal: Traversal) => void;

export class Traversal {
  readonly generation: number;

  private buckets: Visitable[][] = [];
  private queued = new Set<Visitable>();
  private lowest = 0;
  private deferred: Array<() => void> = [];
  private _failures: NodeFailure[] = [];
  private _visits = 0;

  constructor(generation: number) {
    this.generation = generation;
  }

  get failures(): readonly NodeFailure[] {
    return this._failures;
  }

  /** Number of node visits performed so far */
  get visits(): number {
    return this._visits;
  }

  /** Queue a node for this generation; queuing twice is a no-op */
  schedule(node: Visitable): void {
    if (this.queued.has(node)) return;
    this.queued.add(node);
    const rank = node.rank;
    let bucket = this.buckets[rank];
    if (bucket === undefined) {
      bucket = [];
      this.buckets[rank] = bucket;
    }
    bucket.push(node);
    if (rank < this.lowest) this.lowest = rank;
  }

  /** Run an action once the work list has drained */
  defer(fn: () => void): void {
    this.deferred.push(fn);
  }

  fail(failure: NodeFailure): void {
    this._failures.push(failure);
  }

  /** Drain the work list, then the deferred actions */
  run(): void {
    let node = this.take();
    while (node !== undefined) {
      this.queued.delete(node);
      if (node.alive) {
        this._visits++;
        node.visit(this);
      }
      node = this.take();
    }

    // Deferred actions may schedule nothing; they rewire edges for later passes.
    const deferred = this.deferred;
    this.deferred = [];
    for (const fn of deferred) fn();
  }

  private take(): Visitable | undefined {
    for (let rank = this.lowest; rank < this.buckets.length; rank++) {
      const bucket = this.buckets[rank];
      if (bucket !== undefined && bucket.length > 0) {
        this.lowest = rank;
        return bucket.shift();
      }
    }
    this.lowest = this.buckets.length;
    return undefined;
  }
}

/**
 * Serializes passes. A send that arrives while a pass is running (from a
 * callback inside it) is queued and runs as its own generation once the
 * current one completes, before the outermost send returns.
 */
export class Propagator {
  private generation = 0;
  private running = false;
  private queue: PassStart[] = [];
  private warnedRunaway = false;

  /** True while a pass is in progress */
  get busy(): boolean {
    return this.running;
  }

  /** Id of the most recently started generation */
  get lastGeneration(): number {
    return this.generation;
  }

  run(start: PassStart): void {
    this.queue.push(start);
    if (this.running) return;

    this.running = true;
    const failures: NodeFailure[] = [];
    const limit = getPropagationOptions().maxPassesPerSend;
    let passes = 0;

    try {
      let next = this.queue.shift();
      while (next !== undefined) {
        passes++;
        if (passes > limit) {
          if (!this.warnedRunaway) {
            this.warnedRunaway = true;
            console.warn(
              `${LOG_PREFIX} Dropped ${this.queue.length + 1} queued passes after reaching ` +
                `the limit of ${limit} passes for one send.`
            );
          }
          throw new RunawayPropagationError(limit, failures);
        }

        const traversal = new Traversal(++this.generation);
        next(traversal);
        traversal.run();
        failures.push(...traversal.failures);

        next = this.queue.shift();
      }
    } finally {
      this.queue = [];
      this.running = false;
    }

    if (failures.length > 0) {
      throw new PropagationError(failures);
    }
  }
}

/** The engine shared by every graph */
export const propagator = new Propagator();
