/**
 * Contracts shared between the owned buffer and the views borrowing from it.
 */

/**
 * What a StringView needs from the buffer it points into.
 *
 * `generation` must increase whenever existing offsets may stop addressing
 * the same bytes (truncation, clearing, disposal). Appending keeps it stable.
 */
export interface BufferContract {
  /** Number of valid bytes */
  readonly length: number;
  /** Invalidation counter, compared against the generation a view recorded */
  readonly generation: number;
  /** True once the storage has been released */
  readonly isDisposed: boolean;
  /** Checked byte access; throws on an index outside [0, length) */
  at(index: number): number;
  /** Unchecked byte access; an index outside [0, length) reads garbage or undefined */
  unsafeByteAt(index: number): number;
  /**
   * Zero-copy, read-only bytes from `offset` to the end of the buffer.
   * Nothing marks where any particular view ends.
   */
  bytesFrom(offset: number): Readonly<Uint8Array>;
  /** Append the first `count` bytes of `bytes` (default: all of them) */
  append(bytes: Readonly<Uint8Array>, count?: number): this;
}

/**
 * Three-way comparison result.
 */
export type Ordering = -1 | 0 | 1;
