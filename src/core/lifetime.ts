/**
 * Lifetime — Strong counts held by user-facing handles.
 *
 * Every Stream, Signal and Sink owns one Lease on its node. Disposing the
 * handle gives the count back. A handle that becomes garbage without being
 * disposed gives it back from the FinalizationRegistry instead, so forgotten
 * graphs still unwind, just later.
 */

import { getPropagationOptions, LOG_PREFIX } from '../config';
import type { Releasable } from './types';

/** A node as seen by a lease */
export interface Retainable extends Releasable {
  readonly id: number;
  retain(): void;
}

interface LeakRecord {
  node: Retainable;
  what: string;
}

let warnedLeak = false;

const leaked = new FinalizationRegistry<LeakRecord>((record) => {
  if (getPropagationOptions().warnOnLeakedHandles && !warnedLeak) {
    warnedLeak = true;
    console.warn(
      `${LOG_PREFIX} A ${record.what} handle on node #${record.node.id} was garbage-collected ` +
        `without dispose(). Further leaks are released silently.`
    );
  }
  record.node.release();
});

export class Lease {
  private node: Retainable | null;

  /**
   * @param handle - object whose collection releases the lease; null for
   *   leases that must live until released explicitly
   */
  constructor(handle: object | null, node: Retainable, what: string) {
    node.retain();
    this.node = node;
    if (handle !== null) {
      leaked.register(handle, { node, what }, this);
    }
  }

  get active(): boolean {
    return this.node !== null;
  }

  /** Give the count back. Returns false if already released. */
  release(): boolean {
    const node = this.node;
    if (node === null) return false;
    this.node = null;
    leaked.unregister(this);
    node.release();
    return true;
  }
}

/** Reset the once-only leak warning (used by tests) */
export function resetLeakWarning(): void {
  warnedLeak = false;
}
