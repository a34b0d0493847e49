/**
 * Configuration — Constants and process-wide propagation options.
 *
 * The pass limit is read at the start of each outermost send, so a change
 * made from inside a callback applies from the next send on.
 */

// --- Logging ---

/** Prefix for every console diagnostic */
export const LOG_PREFIX = '[tributary]';

// --- Propagation ---

/**
 * Upper bound on the passes a single outermost send may drain.
 * Re-entrant sends queue passes; a callback that keeps sending into its own
 * upstream would otherwise never return.
 */
export const DEFAULT_MAX_PASSES_PER_SEND = 10_000;

// --- Options ---

export interface PropagationOptions {
  /** Passes one outermost send may run before giving up */
  maxPassesPerSend?: number;
  /**
   * Warn once when a handle is collected without being disposed. Off by
   * default: dropping a handle is a normal way to end its subscription.
   */
  warnOnLeakedHandles?: boolean;
}

const defaultOptions: Required<PropagationOptions> = {
  maxPassesPerSend: DEFAULT_MAX_PASSES_PER_SEND,
  warnOnLeakedHandles: false,
};

let options: Required<PropagationOptions> = { ...defaultOptions };

export function setPropagationOptions(opts: PropagationOptions): void {
  if (opts.maxPassesPerSend !== undefined && !(opts.maxPassesPerSend >= 1)) {
    throw new RangeError(`maxPassesPerSend must be at least 1, got ${opts.maxPassesPerSend}`);
  }
  options = {
    maxPassesPerSend: opts.maxPassesPerSend ?? options.maxPassesPerSend,
    warnOnLeakedHandles: opts.warnOnLeakedHandles ?? options.warnOnLeakedHandles,
  };
}

export function getPropagationOptions(): Readonly<Required<PropagationOptions>> {
  return options;
}

/** Restore defaults (used by tests) */
export function resetPropagationOptions(): void {
  options = { ...defaultOptions };
}
