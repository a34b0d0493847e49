import { describe, it, expect } from 'vitest';
import { ValueCell } from '../core/cell';

describe('ValueCell', () => {
  it('starts with the initial value at version 0', () => {
    const cell = new ValueCell('a');
    expect(cell.get()).toBe('a');
    expect(cell.version).toBe(0);
  });

  it('set records the writing generation', () => {
    const cell = new ValueCell(0);
    cell.set(5, 3);
    expect(cell.get()).toBe(5);
    expect(cell.version).toBe(3);

    cell.set(6);
    expect(cell.version).toBe(3);
  });

  it('swap returns the previous value', () => {
    const cell = new ValueCell(1);
    expect(cell.swap(2, 1)).toBe(1);
    expect(cell.get()).toBe(2);
  });

  it('update applies a function to the current value', () => {
    const cell = new ValueCell([1]);
    const next = cell.update((prev) => [...prev, 2], 4);
    expect(next).toEqual([1, 2]);
    expect(cell.get()).toEqual([1, 2]);
    expect(cell.version).toBe(4);
  });
});
