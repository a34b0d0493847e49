import { describe, it, expect } from 'vitest';
import { Signal } from '../core/signal';
import { Sink } from '../core/sink';

describe('Channel', () => {
  it('buffers occurrences until they are read', async () => {
    const sink = new Sink<number>();
    const ch = sink.stream().channel();

    sink.feed([1, 2, 3]);

    expect(ch.size).toBe(3);
    expect(await ch.next()).toEqual({ value: 1, done: false });
    expect(ch.drain()).toEqual([2, 3]);
    expect(ch.size).toBe(0);
    ch.close();
  });

  it('only receives occurrences sent after it was created', () => {
    const sink = new Sink<string>();
    const s = sink.stream();
    sink.send('early');
    const ch = s.channel();
    sink.send('late');

    expect(ch.drain()).toEqual(['late']);
    ch.close();
    s.dispose();
  });

  it('hands a value straight to a waiting reader', async () => {
    const sink = new Sink<number>();
    const ch = sink.stream().channel();

    const read = ch.next();
    sink.send(9);

    expect(await read).toEqual({ value: 9, done: false });
    expect(ch.size).toBe(0);
    ch.close();
  });

  it('unsubscribes when a for-await loop breaks', async () => {
    const sink = new Sink<number>();
    const ch = sink.stream().channel();
    const got: number[] = [];
    const reader = (async () => {
      for await (const v of ch) {
        got.push(v);
        if (v === 3) break;
      }
    })();

    sink.feed([1, 2, 3]);
    await reader;

    expect(got).toEqual([1, 2, 3]);
    expect(ch.closed).toBe(true);
    sink.send(4);
    expect(ch.size).toBe(0);
  });

  it('finishes waiting reads when closed', async () => {
    const sink = new Sink<number>();
    const ch = sink.stream().channel();

    const read = ch.next();
    ch.close();

    expect(await read).toEqual({ value: undefined, done: true });
    expect(await ch.next()).toEqual({ value: undefined, done: true });
  });

  it('keeps buffered values readable after close', async () => {
    const sink = new Sink<number>();
    const ch = sink.stream().channel();
    sink.send(5);

    ch.close();
    sink.send(6);

    expect(await ch.next()).toEqual({ value: 5, done: false });
    expect(await ch.next()).toEqual({ value: undefined, done: true });
  });
});

describe('Signal from a channel', () => {
  it('fromChannel samples the last value drained', () => {
    const sink = new Sink<number>();
    const ch = sink.stream().channel();
    const latest = Signal.fromChannel(0, ch);

    expect(latest.sample()).toBe(0);
    sink.feed([4, 8]);
    expect(ch.size).toBe(2);
    expect(latest.sample()).toBe(8);
    expect(ch.size).toBe(0);
    expect(latest.sample()).toBe(8);

    latest.dispose();
    expect(ch.closed).toBe(true);
  });

  it('foldChannel folds every drained value into the current one', () => {
    const sink = new Sink<number>();
    const total = Signal.foldChannel(10, sink.stream().channel(), (acc, x: number) => acc + x);

    sink.feed([1, 2]);
    expect(total.sample()).toBe(13);
    sink.send(5);
    expect(total.sample()).toBe(18);
    expect(total.sample()).toBe(18);
    total.dispose();
  });

  it('a clone keeps the channel open until both are disposed', () => {
    const sink = new Sink<string>();
    const ch = sink.stream().channel();
    const words = Signal.foldChannel('', ch, (acc, w: string) => acc + w);
    const copy = words.clone();

    words.dispose();
    sink.send('ab');
    expect(copy.sample()).toBe('ab');
    expect(ch.closed).toBe(false);

    copy.dispose();
    expect(ch.closed).toBe(true);
  });
});
