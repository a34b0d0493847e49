/**
 * Node — The unit of the propagation graph.
 *
 * Edges are asymmetric. An upstream keeps only WeakRefs to its subscribers,
 * while every node holds a strong count on each of its upstreams. A chain is
 * therefore alive exactly as long as something holds its far end.
 */

import { propagator } from './propagation';
import type { Traversal } from './propagation';
import type { Receiver, Source, Visitable } from './types';

export type BehaviorKind =
  | 'source'
  | 'map'
  | 'filter'
  | 'filterMap'
  | 'fold'
  | 'merge'
  | 'hold'
  | 'inspect'
  | 'snapshot'
  | 'mapN'
  | 'switch'
  | 'switcher'
  | 'once'
  | 'channel';

/** What a behavior may do besides emitting during its step */
export interface StepContext<O> {
  readonly generation: number;
  /** Run once the current pass has drained */
  defer(fn: () => void): void;
  /** Emit from outside the step, as a pass of its own */
  emitLater(value: O): void;
}

/**
 * The logic of one node. `step` receives every occurrence that reached the
 * node in this generation, in arrival order. Emissions only count if `step`
 * returns normally.
 */
export interface Behavior<I, O> {
  readonly kind: BehaviorKind;
  step(inputs: readonly I[], emit: (value: O) => void, ctx: StepContext<O>): void;
  /** Release whatever the behavior owns; called once, on destruction */
  teardown?(): void;
}

let nextId = 1;

export class Node<I, O> implements Receiver<I>, Source<O>, Visitable {
  readonly id = nextId++;
  readonly behavior: Behavior<I, O>;

  private _rank: number;
  private _alive = true;
  private strong = 0;
  private inbox: I[] = [];
  private subscribers: WeakRef<Receiver<O>>[] = [];
  private upstreams: Source<I>[] = [];

  constructor(behavior: Behavior<I, O>, upstreams: readonly Source<I>[]) {
    this.behavior = behavior;
    this._rank = 0;
    for (const up of upstreams) {
      this.link(up);
    }
  }

  get rank(): number {
    return this._rank;
  }

  get alive(): boolean {
    return this._alive;
  }

  /** Strong holders: handles plus direct downstream nodes */
  get strongCount(): number {
    return this.strong;
  }

  /** Live subscriber edges (dead WeakRefs excluded) */
  get subscriberCount(): number {
    let n = 0;
    for (const ref of this.subscribers) {
      const sub = ref.deref();
      if (sub !== undefined && sub.alive) n++;
    }
    return n;
  }

  // --- Lifetime ---

  retain(): void {
    this.strong++;
  }

  release(): void {
    if (this.strong <= 0) return;
    this.strong--;
    if (this.strong === 0) this.destroy();
  }

  private destroy(): void {
    if (!this._alive) return;
    this._alive = false;
    this.inbox = [];
    this.subscribers = [];
    const ups = this.upstreams;
    this.upstreams = [];
    for (const up of ups) {
      up.unsubscribe(this);
      up.release();
    }
    this.behavior.teardown?.();
  }

  // --- Edges ---

  subscribe(receiver: Receiver<O>): void {
    this.subscribers.push(new WeakRef(receiver));
  }

  unsubscribe(receiver: Receiver<O>): void {
    this.subscribers = this.subscribers.filter((ref) => {
      const sub = ref.deref();
      return sub !== undefined && sub !== receiver;
    });
  }

  /** Add an upstream after construction (used by switch) */
  attach(up: Source<I>): void {
    if (!this._alive) return;
    this.link(up);
  }

  /** Drop every upstream edge, keeping the node itself alive */
  detachAll(): void {
    const ups = this.upstreams;
    this.upstreams = [];
    for (const up of ups) {
      up.unsubscribe(this);
      up.release();
    }
  }

  private link(up: Source<I>): void {
    up.retain();
    up.subscribe(this);
    this.upstreams.push(up);
    if (up.rank >= this._rank) this.raiseRank(up.rank, new Set());
  }

  raiseRank(floor: number, seen: Set<number>): void {
    if (this._rank > floor || seen.has(this.id)) return;
    this._rank = floor + 1;
    seen.add(this.id);
    for (const ref of this.subscribers) {
      ref.deref()?.raiseRank(this._rank, seen);
    }
    seen.delete(this.id);
  }

  // --- Propagation ---

  accept(value: I, traversal: Traversal): void {
    if (!this._alive) return;
    this.inbox.push(value);
    traversal.schedule(this);
  }

  visit(traversal: Traversal): void {
    const inputs = this.inbox;
    this.inbox = [];
    if (!this._alive || inputs.length === 0) return;

    const out: O[] = [];
    const ctx: StepContext<O> = {
      generation: traversal.generation,
      defer: (fn) => traversal.defer(fn),
      emitLater: (value) => this.emitLater(value),
    };

    try {
      this.behavior.step(inputs, (value) => out.push(value), ctx);
    } catch (error) {
      traversal.fail({
        nodeId: this.id,
        kind: this.behavior.kind,
        generation: traversal.generation,
        error,
      });
      return;
    }

    for (const value of out) {
      this.broadcast(value, traversal);
    }
  }

  /** Deliver one occurrence to every live subscriber */
  broadcast(value: O, traversal: Traversal): void {
    let stale = false;
    for (const ref of this.subscribers.slice()) {
      const sub = ref.deref();
      if (sub === undefined || !sub.alive) {
        stale = true;
        continue;
      }
      sub.accept(value, traversal);
    }
    if (stale) this.purge();
  }

  private emitLater(value: O): void {
    if (!this._alive) return;
    propagator.run((traversal) => {
      if (this._alive) this.broadcast(value, traversal);
    });
  }

  private purge(): void {
    this.subscribers = this.subscribers.filter((ref) => {
      const sub = ref.deref();
      return sub !== undefined && sub.alive;
    });
  }
}
