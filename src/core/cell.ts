/**
 * Value Cell — Single-slot holder for a signal's current value.
 *
 * Reads never touch the propagation stack, so a cell can be sampled at any
 * time, including from inside a callback of an unrelated pass.
 */

export class ValueCell<T> {
  private _value: T;
  private _version = 0;

  constructor(initial: T) {
    this._value = initial;
  }

  get(): T {
    return this._value;
  }

  /** Generation of the last write (0 if never written) */
  get version(): number {
    return this._version;
  }

  set(value: T, generation = this._version): void {
    this._value = value;
    this._version = generation;
  }

  /** Replace the value, returning the previous one */
  swap(value: T, generation = this._version): T {
    const prev = this._value;
    this.set(value, generation);
    return prev;
  }

  update(fn: (prev: T) => T, generation = this._version): T {
    const next = fn(this._value);
    this.set(next, generation);
    return next;
  }
}
