/**
 * Core Types — The Either sum type and the graph seams.
 *
 * Nodes talk to each other only through Receiver, Source and Visitable, so
 * the propagation engine never imports the node class.
 */

import type { Traversal } from './propagation';

// --- Sum Type ---

/** A value that is one of two alternatives */
export type Either<L, R> =
  | { readonly tag: 'left'; readonly value: L }
  | { readonly tag: 'right'; readonly value: R };

export function left<L, R = never>(value: L): Either<L, R> {
  return { tag: 'left', value };
}

export function right<R, L = never>(value: R): Either<L, R> {
  return { tag: 'right', value };
}

export function isLeft<L, R>(e: Either<L, R>): e is { readonly tag: 'left'; readonly value: L } {
  return e.tag === 'left';
}

export function isRight<L, R>(e: Either<L, R>): e is { readonly tag: 'right'; readonly value: R } {
  return e.tag === 'right';
}

// --- Callbacks ---

/** Target of mapN emissions; usable during the callback or any time later */
export interface Emitter<T> {
  send(value: T): void;
}

// --- Graph ---

/** Anything holding a strong count that can be given back */
export interface Releasable {
  release(): void;
}

/** Downstream end of a weak edge */
export interface Receiver<T> {
  readonly id: number;
  readonly rank: number;
  readonly alive: boolean;
  /** Queue an occurrence for the current generation */
  accept(value: T, traversal: Traversal): void;
  /** Raise this node (and everything below it) above the given rank */
  raiseRank(floor: number, seen: Set<number>): void;
}

/** Upstream end of a weak edge */
export interface Source<T> extends Releasable {
  readonly id: number;
  readonly rank: number;
  readonly alive: boolean;
  retain(): void;
  subscribe(receiver: Receiver<T>): void;
  unsubscribe(receiver: Receiver<T>): void;
}

/** A node the work list can visit */
export interface Visitable {
  readonly id: number;
  readonly rank: number;
  readonly alive: boolean;
  visit(traversal: Traversal): void;
}
