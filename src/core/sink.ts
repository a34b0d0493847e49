/**
 * Sink — Where values enter the graph.
 *
 * A sink owns a root node with no upstream. Every send runs one complete
 * pass from that root before returning.
 */

import { ForwardBehavior } from './behaviors';
import { DisposedHandleError } from './errors';
import { Lease } from './lifetime';
import { Node } from './node';
import { propagator } from './propagation';
import { Stream } from './stream';

export class Sink<T> {
  private readonly root: Node<T, T>;
  private readonly lease: Lease;

  /** @param root - internal: share an existing root (see clone) */
  constructor(root?: Node<T, T>) {
    this.root = root ?? new Node(new ForwardBehavior<T>('source'), []);
    this.lease = new Lease(this, this.root, 'Sink');
  }

  /** False once this sink has been disposed */
  get alive(): boolean {
    return this.lease.active;
  }

  /** A new handle on the root; every call shares the same node */
  stream(): Stream<T> {
    this.ensureAlive();
    return new Stream(this.root);
  }

  /**
   * Propagate `value` through every live descendant. Called from inside a
   * callback, the pass is queued and runs after the current one.
   *
   * @throws PropagationError if a callback threw
   */
  send(value: T): void {
    this.ensureAlive();
    const root = this.root;
    propagator.run((traversal) => root.accept(value, traversal));
  }

  /** Send each value in order, one pass per value */
  feed(values: Iterable<T>): void {
    for (const value of values) {
      this.send(value);
    }
  }

  /** Another owner of the same root */
  clone(): Sink<T> {
    this.ensureAlive();
    return new Sink(this.root);
  }

  dispose(): void {
    this.lease.release();
  }

  private ensureAlive(): void {
    if (!this.lease.active) throw new DisposedHandleError('Sink');
  }
}
