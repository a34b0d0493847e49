/**
 * Channel — Occurrences of a stream, queued for a consumer outside the graph.
 *
 * A channel subscribes a node that appends every occurrence to a mailbox.
 * Readers either pull with `for await` (or `next()`), or drain whatever is
 * buffered without waiting. The channel stays subscribed until it is closed,
 * its iterator is returned, or the handle is collected.
 *
 * The node writes into the mailbox, never into the handle, so nothing in the
 * graph keeps a dropped channel reachable.
 */

import { ChannelBehavior } from './behaviors';
import { Lease } from './lifetime';
import { Node } from './node';
import type { Source } from './types';

type Read<T> = IteratorResult<T, undefined>;

const DONE: IteratorReturnResult<undefined> = { value: undefined, done: true };

class Mailbox<T> {
  buffer: T[] = [];
  readers: Array<(result: Read<T>) => void> = [];

  put(value: T): void {
    const reader = this.readers.shift();
    if (reader === undefined) {
      this.buffer.push(value);
    } else {
      reader({ value, done: false });
    }
  }
}

export class Channel<T> implements AsyncIterableIterator<T> {
  private readonly mailbox = new Mailbox<T>();
  private readonly node: Node<T, never>;
  private readonly lease: Lease;

  /** @internal Use Stream.channel() */
  constructor(source: Source<T>) {
    const mailbox = this.mailbox;
    this.node = new Node<T, never>(new ChannelBehavior<T>((value) => mailbox.put(value)), [source]);
    this.lease = new Lease(this, this.node, 'Channel');
  }

  /** True once unsubscribed */
  get closed(): boolean {
    return !this.lease.active;
  }

  /** Values received and not yet read */
  get size(): number {
    return this.mailbox.buffer.length;
  }

  /** Rank of the node that fills the mailbox */
  get rank(): number {
    return this.node.rank;
  }

  /** The oldest unread value, waiting for one if none is buffered */
  next(): Promise<Read<T>> {
    const { buffer, readers } = this.mailbox;
    if (buffer.length > 0) {
      const read: Read<T> = { value: buffer[0], done: false };
      buffer.shift();
      return Promise.resolve(read);
    }
    if (this.closed) return Promise.resolve(DONE);
    return new Promise<Read<T>>((resolve) => readers.push(resolve));
  }

  /** Take everything buffered without waiting */
  drain(): T[] {
    const items = this.mailbox.buffer;
    this.mailbox.buffer = [];
    return items;
  }

  /**
   * Unsubscribe from the stream. Buffered values can still be read; reads
   * that were waiting finish as done.
   */
  close(): void {
    if (!this.lease.release()) return;
    const readers = this.mailbox.readers;
    this.mailbox.readers = [];
    for (const reader of readers) reader(DONE);
  }

  dispose(): void {
    this.close();
  }

  /** Called when a `for await` loop exits early */
  return(): Promise<Read<T>> {
    this.close();
    return Promise.resolve(DONE);
  }

  [Symbol.asyncIterator](): this {
    return this;
  }
}
