/**
 * Behaviors — One variant per combinator.
 *
 * Each behavior carries its captured state as plain fields, so what a node
 * owns is visible without reading closures.
 */

import type { ValueCell } from './cell';
import type { Behavior, BehaviorKind, StepContext } from './node';
import type { Emitter, Releasable, Source } from './types';

// --- Pass-through ---

/** Forwards every occurrence unchanged (sinks, merge, switch outputs) */
export class ForwardBehavior<T> implements Behavior<T, T> {
  readonly kind: BehaviorKind;
  private owned: Releasable[] = [];

  constructor(kind: 'source' | 'merge' | 'switch') {
    this.kind = kind;
  }

  /** Keep something alive for as long as this node lives */
  own(r: Releasable): void {
    this.owned.push(r);
  }

  step(inputs: readonly T[], emit: (value: T) => void): void {
    for (const x of inputs) emit(x);
  }

  teardown(): void {
    const owned = this.owned;
    this.owned = [];
    for (const r of owned) r.release();
  }
}

export class InspectBehavior<T> implements Behavior<T, T> {
  readonly kind = 'inspect';

  constructor(private readonly f: (value: T) => void) {}

  step(inputs: readonly T[], emit: (value: T) => void): void {
    for (const x of inputs) {
      this.f(x);
      emit(x);
    }
  }
}

// --- Stateless transforms ---

export class MapBehavior<I, O> implements Behavior<I, O> {
  readonly kind = 'map';

  constructor(private readonly f: (value: I) => O) {}

  step(inputs: readonly I[], emit: (value: O) => void): void {
    for (const x of inputs) emit(this.f(x));
  }
}

export class FilterBehavior<T> implements Behavior<T, T> {
  readonly kind = 'filter';

  constructor(private readonly pred: (value: T) => boolean) {}

  step(inputs: readonly T[], emit: (value: T) => void): void {
    for (const x of inputs) {
      if (this.pred(x)) emit(x);
    }
  }
}

/** `undefined` from `f` means "no occurrence" */
export class FilterMapBehavior<I, O> implements Behavior<I, O> {
  readonly kind = 'filterMap';

  constructor(private readonly f: (value: I) => O | undefined) {}

  step(inputs: readonly I[], emit: (value: O) => void): void {
    for (const x of inputs) {
      const y = this.f(x);
      if (y !== undefined) emit(y);
    }
  }
}

// --- Stateful ---

/**
 * The accumulator is only committed after the whole batch folded, so a
 * throwing `f` leaves it as it was before the generation.
 */
export class FoldBehavior<I, A> implements Behavior<I, A> {
  readonly kind = 'fold';
  private acc: A;

  constructor(init: A, private readonly f: (acc: A, value: I) => A) {
    this.acc = init;
  }

  get current(): A {
    return this.acc;
  }

  step(inputs: readonly I[], emit: (value: A) => void): void {
    let acc = this.acc;
    for (const x of inputs) {
      acc = this.f(acc, x);
      emit(acc);
    }
    this.acc = acc;
  }
}

/** Writes the last accepted occurrence of the generation into the cell */
export class HoldBehavior<T> implements Behavior<T, never> {
  readonly kind = 'hold';

  constructor(
    private readonly cell: ValueCell<T>,
    private readonly pred: (value: T) => boolean
  ) {}

  step(inputs: readonly T[], _emit: (value: never) => void, ctx: StepContext<never>): void {
    for (let i = inputs.length - 1; i >= 0; i--) {
      const x = inputs[i];
      if (this.pred(x)) {
        this.cell.set(x, ctx.generation);
        return;
      }
    }
  }
}

/** Anything sampleable that must be released with the node */
export interface Sampler<S> {
  sample(): S;
  dispose(): void;
}

export class SnapshotBehavior<I, S, O> implements Behavior<I, O> {
  readonly kind = 'snapshot';

  constructor(
    private readonly sampler: Sampler<S>,
    private readonly f: (value: I, sampled: S) => O
  ) {}

  step(inputs: readonly I[], emit: (value: O) => void): void {
    for (const x of inputs) emit(this.f(x, this.sampler.sample()));
  }

  teardown(): void {
    this.sampler.dispose();
  }
}

/**
 * The emitter handed to `f` delivers into the current visit while `f` runs.
 * Kept and used later, each send becomes a pass of its own.
 */
export class MapNBehavior<I, O> implements Behavior<I, O> {
  readonly kind = 'mapN';

  constructor(private readonly f: (value: I, emitter: Emitter<O>) => void) {}

  step(inputs: readonly I[], emit: (value: O) => void, ctx: StepContext<O>): void {
    let open = true;
    const emitter: Emitter<O> = {
      send: (value) => (open ? emit(value) : ctx.emitLater(value)),
    };
    try {
      for (const x of inputs) this.f(x, emitter);
    } finally {
      open = false;
    }
  }
}

// --- Dynamic wiring ---

/** The part of a node a switcher rewires */
export interface Rewirable<T> {
  readonly alive: boolean;
  attach(up: Source<T>): void;
  detachAll(): void;
}

/**
 * Listens to a stream of streams. At the end of each generation in which a
 * new inner stream arrived, moves the output's single upstream edge to it.
 */
export class SwitcherBehavior<I, U> implements Behavior<I, never> {
  readonly kind = 'switcher';

  constructor(
    private readonly output: WeakRef<Rewirable<U>>,
    private readonly resolve: (inner: I) => Source<U> | null
  ) {}

  step(inputs: readonly I[], _emit: (value: never) => void, ctx: StepContext<never>): void {
    const latest = inputs[inputs.length - 1];
    const source = this.resolve(latest);
    ctx.defer(() => {
      const out = this.output.deref();
      if (out === undefined || !out.alive) return;
      out.detachAll();
      if (source !== null && source.alive) out.attach(source);
    });
  }
}

/** Fires once, then asks to be detached when the pass completes */
export class OnceBehavior<T> implements Behavior<T, never> {
  readonly kind = 'once';
  private fired = false;

  constructor(
    private readonly onFirst: (value: T) => void,
    private readonly onDone: () => void
  ) {}

  step(inputs: readonly T[], _emit: (value: never) => void, ctx: StepContext<never>): void {
    if (this.fired || inputs.length === 0) return;
    this.fired = true;
    this.onFirst(inputs[0]);
    ctx.defer(this.onDone);
  }
}

/** Hands every occurrence to a consumer outside the graph */
export class ChannelBehavior<T> implements Behavior<T, never> {
  readonly kind = 'channel';

  constructor(private readonly deliver: (value: T) => void) {}

  step(inputs: readonly T[]): void {
    for (const x of inputs) this.deliver(x);
  }
}
