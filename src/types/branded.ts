/**
 * Branded byte position types.
 *
 * A view addresses its buffer through an offset (a position) and a length
 * (a count). Both are plain numbers at runtime; the brands keep them from
 * being swapped at call sites such as `new StringView(buf, length, offset)`.
 *
 * ```typescript
 * const start = byteOffset(4);
 * const size = byteLength(3);
 *
 * // Type error: a ByteLength is not a ByteOffset
 * const wrong: ByteOffset = size;
 * ```
 */

declare const brand: unique symbol;

interface Brand<B> {
  readonly [brand]: B;
}

type Branded<T, B> = T & Brand<B>;

// =============================================================================
// Position Types
// =============================================================================

/**
 * Byte offset into a buffer.
 *
 * Use when:
 * - Indexing into a buffer's Uint8Array storage
 * - Storing where a view starts
 */
export type ByteOffset = Branded<number, 'ByteOffset'>;

/**
 * Byte length (size/count of bytes).
 *
 * Semantically distinct from ByteOffset: an offset is a position,
 * a length is a size/count.
 */
export type ByteLength = Branded<number, 'ByteLength'>;

// =============================================================================
// Constructor Functions
// =============================================================================

/**
 * Create a ByteOffset from a number.
 * No validation happens here; use `isValidOffset` first when the value is untrusted.
 */
export function byteOffset(value: number): ByteOffset {
  return value as ByteOffset;
}

/**
 * Create a ByteLength from a number.
 */
export function byteLength(value: number): ByteLength {
  return value as ByteLength;
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Check if a value can be used as an offset or length (non-negative integer).
 */
export function isValidOffset(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

// =============================================================================
// Arithmetic Helpers
// =============================================================================

/**
 * Add a delta to a ByteOffset.
 */
export function addByteOffset(offset: ByteOffset, delta: number): ByteOffset {
  return (offset + delta) as ByteOffset;
}

/**
 * Number of bytes between `offset` and `limit`, or zero when `offset` is past it.
 */
export function remainingLength(limit: number, offset: ByteOffset): ByteLength {
  return Math.max(0, limit - offset) as ByteLength;
}

// =============================================================================
// Zero Constants
// =============================================================================

export const ZERO_BYTE_OFFSET: ByteOffset = 0 as ByteOffset;

export const ZERO_BYTE_LENGTH: ByteLength = 0 as ByteLength;
