/**
 * tributary — Push-based streams and signals with glitch-free propagation
 *
 * Main entry point. Exports all public API.
 */

// Core primitives
export { Sink, Stream, Signal, Suspension, Channel, ValueCell } from './core';

// Errors
export { FrpError, PropagationError, DisposedHandleError, RunawayPropagationError } from './core';
export type { FrpErrorCode, NodeFailure } from './core';

// Sum type helpers
export { left, right, isLeft, isRight } from './core';
export type { Either, Emitter } from './core';

// Configuration
export {
  DEFAULT_MAX_PASSES_PER_SEND,
  LOG_PREFIX,
  setPropagationOptions,
  getPropagationOptions,
  resetPropagationOptions,
} from './config';
export type { PropagationOptions } from './config';
