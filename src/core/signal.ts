/**
 * Signal — A value that can be sampled at any time.
 *
 * A signal is a constant, a cell written by a hold node, or a function
 * evaluated on each sample (of other signals, or of a channel it drains).
 * Sampling never blocks and never depends on whether a pass is running.
 */

import { ValueCell } from './cell';
import type { Channel } from './channel';
import { Lease } from './lifetime';
import type { Retainable } from './lifetime';
import type { Stream } from './stream';

/** A held signal's node; its rank orders snapshots taken from it */
export interface HoldNode extends Retainable {
  readonly rank: number;
  readonly alive: boolean;
}

/** What a derived signal needs from the signals it reads */
interface Dependency {
  readonly rank: number;
  dispose(): void;
}

/** Shared by every clone of a derived signal */
interface DerivedCore<T> {
  compute: () => T;
  deps: Dependency[];
  refs: number;
}

type SignalState<T> =
  | { kind: 'constant'; value: T }
  | { kind: 'held'; cell: ValueCell<T>; node: HoldNode }
  | { kind: 'derived'; core: DerivedCore<T> };

export class Signal<T> {
  private readonly state: SignalState<T>;
  private readonly lease: Lease | null;
  private disposed = false;

  private constructor(state: SignalState<T>) {
    this.state = state;
    this.lease = state.kind === 'held' ? new Lease(this, state.node, 'Signal') : null;
  }

  // --- Construction ---

  /** A signal that always samples as `value` */
  static constant<T>(value: T): Signal<T> {
    return new Signal<T>({ kind: 'constant', value });
  }

  /** A signal computed by `fn` on every sample */
  static fromFn<T>(fn: () => T): Signal<T> {
    return Signal.derive(fn, []);
  }

  /** A signal computed from two others */
  static combine<A, B, R>(a: Signal<A>, b: Signal<B>, f: (a: A, b: B) => R): Signal<R> {
    const ca = a.clone();
    const cb = b.clone();
    return Signal.derive(() => f(ca.sample(), cb.sample()), [ca, cb]);
  }

  /**
   * The last value received on `channel`. Sampling drains the channel
   * without waiting; the signal owns it and closes it on dispose.
   */
  static fromChannel<T>(initial: T, channel: Channel<T>): Signal<T> {
    const cell = new ValueCell(initial);
    return Signal.derive(() => {
      const items = channel.drain();
      if (items.length > 0) cell.set(items[items.length - 1]);
      return cell.get();
    }, [channel]);
  }

  /** Like fromChannel, folding every drained value into the current one */
  static foldChannel<T, V>(initial: T, channel: Channel<V>, f: (acc: T, value: V) => T): Signal<T> {
    const cell = new ValueCell(initial);
    return Signal.derive(() => cell.update((acc) => channel.drain().reduce(f, acc)), [channel]);
  }

  /** @internal Wrap a cell written by a hold node */
  static held<T>(cell: ValueCell<T>, node: HoldNode): Signal<T> {
    return new Signal<T>({ kind: 'held', cell, node });
  }

  private static derive<T>(compute: () => T, deps: Dependency[]): Signal<T> {
    return new Signal<T>({ kind: 'derived', core: { compute, deps, refs: 1 } });
  }

  // --- Reading ---

  sample(): T {
    const state = this.state;
    switch (state.kind) {
      case 'constant':
        return state.value;
      case 'held':
        return state.cell.get();
      case 'derived':
        return state.core.compute();
    }
  }

  /** Sample and hand the value to `f` */
  sampleWith<R>(f: (value: T) => R): R {
    return f(this.sample());
  }

  /**
   * Rank of the node that writes this signal; a snapshot node must sit above
   * it to observe writes from the same generation.
   */
  get rank(): number {
    const state = this.state;
    switch (state.kind) {
      case 'constant':
        return 0;
      case 'held':
        return state.node.rank;
      case 'derived':
        return state.core.deps.reduce((max, dep) => Math.max(max, dep.rank), 0);
    }
  }

  /** False once disposed; a disposed signal keeps sampling its last value */
  get alive(): boolean {
    return !this.disposed;
  }

  // --- Combinators ---

  map<U>(f: (value: T) => U): Signal<U> {
    const parent = this.clone();
    return Signal.derive(() => f(parent.sample()), [parent]);
  }

  /** Sample this signal every time `trigger` fires */
  snapshot<S, R>(trigger: Stream<S>, f: (value: T, occurrence: S) => R): Stream<R> {
    return trigger.snapshot(this, (occurrence, value) => f(value, occurrence));
  }

  /** Flatten a signal of signals by sampling the current inner one */
  switch<U>(this: Signal<Signal<U>>): Signal<U> {
    const parent = this.clone();
    return Signal.derive(() => parent.sample().sample(), [parent]);
  }

  // --- Lifetime ---

  clone(): Signal<T> {
    const state = this.state;
    switch (state.kind) {
      case 'constant':
        return Signal.constant(state.value);
      case 'held':
        return Signal.held(state.cell, state.node);
      case 'derived':
        state.core.refs++;
        return new Signal<T>({ kind: 'derived', core: state.core });
    }
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.lease?.release();
    const state = this.state;
    if (state.kind === 'derived') {
      state.core.refs--;
      if (state.core.refs === 0) {
        for (const dep of state.core.deps) dep.dispose();
      }
    }
  }
}
