/**
 * Core — The propagation engine and its handles.
 *
 * Sinks feed streams, streams build nodes, signals read cells.
 */

export { Sink } from './sink';
export { Stream } from './stream';
export { Signal } from './signal';
export { Suspension } from './suspension';
export { Channel } from './channel';
export { ValueCell } from './cell';
export { Propagator, Traversal, propagator } from './propagation';

export { FrpError, PropagationError, DisposedHandleError, RunawayPropagationError } from './errors';
export type { FrpErrorCode, NodeFailure } from './errors';

export { left, right, isLeft, isRight } from './types';
export type { Either, Emitter } from './types';
