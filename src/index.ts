/**
 * byteview - non-owning byte-range views over growable byte strings
 *
 * Main entry point exporting the view, its owning buffer, and utilities.
 */

// =============================================================================
// Types
// =============================================================================

export type { BufferContract, Ordering, ByteOffset, ByteLength } from './types/index.ts';

export {
  byteOffset,
  byteLength,
  isValidOffset,
  addByteOffset,
  remainingLength,
  ZERO_BYTE_OFFSET,
  ZERO_BYTE_LENGTH,
} from './types/index.ts';

// =============================================================================
// Views and Buffers
// =============================================================================

export { StringView } from './core/string-view.ts';
export type { ViewOperand } from './core/string-view.ts';
export { GrowableBuffer } from './core/growable-buffer.ts';
export { appendView, concatView } from './core/concat.ts';

// =============================================================================
// Errors and Configuration
// =============================================================================

export { ViewInvariantError, invariant, isViewInvariantError } from './core/errors.ts';
export type { ViewInvariantCode } from './core/errors.ts';
export { configureViews, getViewConfig, resetViewConfig } from './core/config.ts';
export type { ViewConfig, ViewLogger } from './core/config.ts';
