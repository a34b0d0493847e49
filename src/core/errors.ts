/**
 * Errors — Failures the engine reports to callers.
 *
 * Every error thrown by tributary itself extends FrpError and carries a
 * stable string code. Errors thrown by user callbacks are never replaced;
 * they travel as the `cause` of a PropagationError.
 */

export type FrpErrorCode =
  | 'PROPAGATION_FAILED'
  | 'DISPOSED_HANDLE'
  | 'RUNAWAY_PROPAGATION';

export class FrpError extends Error {
  readonly code: FrpErrorCode;

  constructor(code: FrpErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FrpError';
    this.code = code;
  }
}

/** One callback failure recorded during a pass */
export interface NodeFailure {
  nodeId: number;
  kind: string;
  generation: number;
  error: unknown;
}

/**
 * Thrown by send/feed when one or more callbacks threw during propagation.
 * The subtrees below the failing nodes were skipped; the rest of the pass ran.
 */
export class PropagationError extends FrpError {
  readonly failures: readonly NodeFailure[];

  constructor(failures: readonly NodeFailure[]) {
    const first = failures[0];
    const where = first ? `${first.kind} node #${first.nodeId} in generation ${first.generation}` : 'unknown node';
    const more = failures.length > 1 ? ` (and ${failures.length - 1} more)` : '';
    super('PROPAGATION_FAILED', `Callback failed at ${where}${more}: ${describe(first?.error)}`, {
      cause: first?.error,
    });
    this.name = 'PropagationError';
    this.failures = failures;
  }
}

export class DisposedHandleError extends FrpError {
  constructor(what: string) {
    super('DISPOSED_HANDLE', `Cannot use a disposed ${what}`);
    this.name = 'DisposedHandleError';
  }
}

/**
 * Thrown when one send drains more passes than allowed. Callback failures
 * from the passes that did run are kept in `failures`, the first as `cause`.
 */
export class RunawayPropagationError extends FrpError {
  readonly limit: number;
  readonly failures: readonly NodeFailure[];

  constructor(limit: number, failures: readonly NodeFailure[] = []) {
    super(
      'RUNAWAY_PROPAGATION',
      `More than ${limit} passes queued by a single send. ` +
        `A callback is probably sending back into its own upstream.`,
      failures.length > 0 ? { cause: failures[0].error } : undefined
    );
    this.name = 'RunawayPropagationError';
    this.limit = limit;
    this.failures = failures;
  }
}

function describe(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
