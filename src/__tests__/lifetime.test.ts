import { describe, it, expect } from 'vitest';
import { DisposedHandleError } from '../core/errors';
import { Sink } from '../core/sink';

describe('handle lifetime', () => {
  it('disposing the last handle silences the subtree', () => {
    const sink = new Sink<number>();
    let count = 0;
    const counted = sink
      .stream()
      .map((x) => x + 1)
      .inspect(() => {
        count++;
      });

    sink.send(1);
    expect(count).toBe(1);

    counted.dispose();
    sink.send(2);
    sink.send(3);
    expect(count).toBe(1);
  });

  it('intermediate handles can go without breaking the chain', () => {
    const sink = new Sink<number>();
    const s = sink.stream();
    let mapped = 0;
    const m = s.map((x) => {
      mapped++;
      return x;
    });
    const seen: number[] = [];
    const out = m.inspect((v) => seen.push(v));

    m.dispose();
    sink.send(1);
    expect(mapped).toBe(1);
    expect(seen).toEqual([1]);

    out.dispose();
    sink.send(2);
    expect(mapped).toBe(1);
    s.dispose();
  });

  it('a clone keeps the node alive after the first handle is disposed', () => {
    const sink = new Sink<number>();
    let count = 0;
    const out = sink.stream().inspect(() => {
      count++;
    });
    const copy = out.clone();

    out.dispose();
    sink.send(1);
    expect(count).toBe(1);

    copy.dispose();
    sink.send(2);
    expect(count).toBe(1);
  });

  it('a held signal keeps its upstream chain alive', () => {
    const sink = new Sink<number>();
    let runs = 0;
    const mapped = sink.stream().map((x) => {
      runs++;
      return x * 2;
    });
    const sig = mapped.hold(0);
    mapped.dispose();

    sink.send(1);
    expect(runs).toBe(1);
    expect(sig.sample()).toBe(2);

    sig.dispose();
    sink.send(2);
    expect(runs).toBe(1);
    expect(sig.sample()).toBe(2);
  });

  it('a snapshot keeps the sampled signal alive', () => {
    const values = new Sink<number>();
    const ticks = new Sink<null>();
    const level = values.stream().hold(0);
    const readings: number[] = [];
    const out = ticks
      .stream()
      .sample(level)
      .inspect((v) => readings.push(v));

    level.dispose();
    values.send(7);
    ticks.send(null);

    expect(readings).toEqual([7]);
    out.dispose();
  });

  it('disposing a stream inside its own callback stops later passes only', () => {
    const sink = new Sink<number>();
    const seen: number[] = [];
    const holder: { out?: { dispose(): void } } = {};
    holder.out = sink.stream().inspect((v) => {
      seen.push(v);
      holder.out?.dispose();
    });

    sink.send(1);
    sink.send(2);

    expect(seen).toEqual([1]);
  });

  describe('disposed handles', () => {
    it('refuse to build new combinators', () => {
      const sink = new Sink<number>();
      const s = sink.stream();
      s.dispose();

      expect(s.alive).toBe(false);
      expect(() => s.map((x) => x)).toThrow(DisposedHandleError);
      expect(() => s.clone()).toThrow(DisposedHandleError);
    });

    it('dispose twice is a no-op', () => {
      const sink = new Sink<number>();
      let count = 0;
      const a = sink.stream().inspect(() => {
        count++;
      });
      const b = a.clone();

      a.dispose();
      a.dispose();
      sink.send(1);

      expect(count).toBe(1);
      b.dispose();
    });

    it('a disposed sink cannot send', () => {
      const sink = new Sink<number>();
      sink.dispose();

      expect(sink.alive).toBe(false);
      expect(() => sink.send(1)).toThrow(DisposedHandleError);
      expect(() => sink.stream()).toThrow(/Cannot use a disposed Sink/);
    });

    it('a sink clone keeps sending after the first handle is disposed', () => {
      const sink = new Sink<number>();
      const other = sink.clone();
      const last = sink.stream().hold(0);

      sink.dispose();
      other.send(9);

      expect(last.sample()).toBe(9);
      last.dispose();
      other.dispose();
    });
  });
});
