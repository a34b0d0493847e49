/**
 * Stream — A handle on a node that emits discrete occurrences.
 *
 * Every combinator allocates a new node, subscribes it weakly to this one
 * and returns a new handle. The new node keeps its upstream alive, so
 * intermediate handles can be disposed without breaking the chain.
 */

import {
  FilterBehavior,
  FilterMapBehavior,
  FoldBehavior,
  ForwardBehavior,
  HoldBehavior,
  InspectBehavior,
  MapBehavior,
  MapNBehavior,
  SnapshotBehavior,
  SwitcherBehavior,
} from './behaviors';
import { ValueCell } from './cell';
import { Channel } from './channel';
import { DisposedHandleError } from './errors';
import { Lease } from './lifetime';
import { Node } from './node';
import type { Behavior } from './node';
import { Signal } from './signal';
import { Suspension } from './suspension';
import { left, right } from './types';
import type { Either, Emitter, Source } from './types';

export class Stream<T> {
  private readonly _source: Source<T>;
  private readonly lease: Lease;

  /** @internal Use Sink.stream() or a combinator */
  constructor(source: Source<T>) {
    this._source = source;
    this.lease = new Lease(this, source, 'Stream');
  }

  /** False once this handle has been disposed */
  get alive(): boolean {
    return this.lease.active;
  }

  /** @internal The node behind this handle */
  get source(): Source<T> {
    if (!this.lease.active) throw new DisposedHandleError('Stream');
    return this._source;
  }

  private derive<O>(behavior: Behavior<T, O>): Stream<O> {
    return new Stream(new Node(behavior, [this.source]));
  }

  // --- Transforms ---

  map<U>(f: (value: T) => U): Stream<U> {
    return this.derive(new MapBehavior(f));
  }

  /** Occurrences failing `pred` produce no notification at all */
  filter(pred: (value: T) => boolean): Stream<T> {
    return this.derive(new FilterBehavior(pred));
  }

  /** Emits `f(x)` unless it is `undefined` */
  filterMap<U>(f: (value: T) => U | undefined): Stream<U> {
    return this.derive(new FilterMapBehavior(f));
  }

  /** Emits the running accumulator after each occurrence */
  fold<A>(init: A, f: (acc: A, value: T) => A): Stream<A> {
    return this.derive(new FoldBehavior(init, f));
  }

  scan<A>(init: A, f: (acc: A, value: T) => A): Stream<A> {
    return this.fold(init, f);
  }

  /** Pass-through for side effects; a throwing `f` fails the send */
  inspect(f: (value: T) => void): Stream<T> {
    return this.derive(new InspectBehavior(f));
  }

  /**
   * Emit zero or more values per occurrence through `emitter`. Sends made
   * while `f` runs join the current pass; sends made later start new ones.
   */
  mapN<U>(f: (value: T, emitter: Emitter<U>) => void): Stream<U> {
    return this.derive(new MapNBehavior(f));
  }

  // --- Combining ---

  /**
   * Occurrences of both streams. When both fire in one pass, both are
   * delivered, upstream rank order first, then subscription order.
   */
  merge(other: Stream<T>): Stream<T> {
    return new Stream(new Node(new ForwardBehavior<T>('merge'), [this.source, other.source]));
  }

  /** Merge streams of different types through `f` */
  mergeWith<U, R>(other: Stream<U>, f: (value: Either<T, U>) => R): Stream<R> {
    const lefts = this.map((v) => left<T, U>(v));
    const rights = other.map((v) => right<U, T>(v));
    const both = lefts.merge(rights);
    const out = both.map(f);
    lefts.dispose();
    rights.dispose();
    both.dispose();
    return out;
  }

  /** Pair each occurrence with the current value of `signal` */
  snapshot<S, R>(signal: Signal<S>, f: (value: T, sampled: S) => R): Stream<R> {
    const node = new Node(new SnapshotBehavior(signal.clone(), f), [this.source]);
    node.raiseRank(signal.rank, new Set());
    return new Stream(node);
  }

  /** Replace each occurrence with the current value of `signal` */
  sample<S>(signal: Signal<S>): Stream<S> {
    return this.snapshot(signal, (_value, sampled) => sampled);
  }

  // --- Signals ---

  hold(init: T): Signal<T> {
    return this.holdIf(init, () => true);
  }

  /** Hold only the occurrences satisfying `pred` */
  holdIf(init: T, pred: (value: T) => boolean): Signal<T> {
    const cell = new ValueCell(init);
    const node = new Node<T, never>(new HoldBehavior(cell, pred), [this.source]);
    return Signal.held(cell, node);
  }

  // --- Shape-specific ---

  filterDefined<U>(this: Stream<U | null | undefined>): Stream<U> {
    return this.mapN<U>((value, out) => {
      if (value !== null && value !== undefined) out.send(value);
    });
  }

  filterLeft<L, R>(this: Stream<Either<L, R>>): Stream<L> {
    return this.mapN<L>((value, out) => {
      if (value.tag === 'left') out.send(value.value);
    });
  }

  filterRight<L, R>(this: Stream<Either<L, R>>): Stream<R> {
    return this.mapN<R>((value, out) => {
      if (value.tag === 'right') out.send(value.value);
    });
  }

  split<L, R>(this: Stream<Either<L, R>>): [Stream<L>, Stream<R>] {
    return [this.filterLeft(), this.filterRight()];
  }

  /**
   * Forward the occurrences of the most recent inner stream. A new inner
   * stream takes over at the end of the pass that delivered it.
   */
  switch<U>(this: Stream<Stream<U>>): Stream<U> {
    const relay = new ForwardBehavior<U>('switch');
    const output = new Node<U, U>(relay, []);
    const switcher = new Node<Stream<U>, never>(
      new SwitcherBehavior<Stream<U>, U>(new WeakRef(output), (inner) => (inner.alive ? inner.source : null)),
      [this.source]
    );
    switcher.retain();
    relay.own(switcher);
    return new Stream(output);
  }

  // --- Async ---

  /** Resolves with the first occurrence after this call */
  next(): Suspension<T> {
    return new Suspension(this.source);
  }

  /** Queue every later occurrence for a reader outside the graph */
  channel(): Channel<T> {
    return new Channel(this.source);
  }

  // --- Lifetime ---

  clone(): Stream<T> {
    return new Stream(this.source);
  }

  dispose(): void {
    this.lease.release();
  }
}
