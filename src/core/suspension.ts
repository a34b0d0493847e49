/**
 * Suspension — The next occurrence of a stream, as a PromiseLike.
 *
 * A one-shot node is subscribed to the stream. Upstreams only hold weak
 * edges, so every waiting node is pinned in a module-level set until it
 * fires or is cancelled; the caller may drop everything but the promise.
 * It resolves once, with the first occurrence, and detaches when that pass
 * completes. If nothing is ever sent it stays pending; timeouts are the
 * caller's business.
 */

import { OnceBehavior } from './behaviors';
import { Lease } from './lifetime';
import { Node } from './node';
import type { Source } from './types';

/** One-shot nodes still waiting for their occurrence */
const waiting = new Set<object>();

export class Suspension<T> implements PromiseLike<T> {
  private readonly promise: Promise<T>;
  private readonly node: Node<T, never>;
  private resolveFn: ((value: T) => void) | null = null;
  private lease: Lease | null;
  private _settled = false;

  /** @internal Use Stream.next() */
  constructor(source: Source<T>) {
    this.promise = new Promise<T>((resolve) => {
      this.resolveFn = resolve;
    });
    this.node = new Node<T, never>(
      new OnceBehavior<T>(
        (value) => this.settle(value),
        () => this.detach()
      ),
      [source]
    );
    this.lease = new Lease(null, this.node, 'Suspension');
    waiting.add(this.node);
  }

  /** True once resolved */
  get settled(): boolean {
    return this._settled;
  }

  /** True while still subscribed */
  get pending(): boolean {
    return this.lease !== null;
  }

  then<R1 = T, R2 = never>(
    onfulfilled?: ((value: T) => R1 | PromiseLike<R1>) | null,
    onrejected?: ((reason: unknown) => R2 | PromiseLike<R2>) | null
  ): Promise<R1 | R2> {
    return this.promise.then(onfulfilled, onrejected);
  }

  /** Stop waiting; the suspension will never resolve */
  cancel(): void {
    this.detach();
  }

  private settle(value: T): void {
    if (this._settled) return;
    this._settled = true;
    const resolve = this.resolveFn;
    this.resolveFn = null;
    resolve?.(value);
  }

  private detach(): void {
    const lease = this.lease;
    this.lease = null;
    waiting.delete(this.node);
    lease?.release();
  }
}

/** Number of suspensions still subscribed */
export function waitingSuspensions(): number {
  return waiting.size;
}
