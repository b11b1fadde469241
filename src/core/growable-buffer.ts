/**
 * Owned, growable byte string that views borrow from.
 *
 * The buffer grows by doubling when capacity is exceeded.
 * Bytes in [0, length) are valid; bytes beyond are uninitialized.
 *
 * Appending never moves a byte that is already in [0, length), so views
 * taken before an append stay valid. Truncating, clearing and disposing do
 * move the end of the valid range; each bumps `generation` so views taken
 * earlier can tell they are stale.
 */

import type { BufferContract } from '../types/buffer.ts';
import type { StringView } from './string-view.ts';
import { invariant } from './errors.ts';
import { isValidOffset } from '../types/branded.ts';
import { textDecoder, textEncoder } from './encoding.ts';

export class GrowableBuffer implements BufferContract {
  /** Backing storage (may have unused capacity beyond `length`) */
  private storage: Uint8Array;
  private size: number = 0;
  private gen: number = 0;
  private disposed: boolean = false;

  constructor(capacity: number = 0) {
    invariant(isValidOffset(capacity), 'LENGTH_OUT_OF_RANGE', `Invalid capacity: ${capacity}`, {
      capacity,
    });
    this.storage = new Uint8Array(capacity);
  }

  static withCapacity(capacity: number): GrowableBuffer {
    return new GrowableBuffer(capacity);
  }

  /**
   * Create a buffer holding the UTF-8 encoding of `text`.
   */
  static from(text: string): GrowableBuffer {
    return GrowableBuffer.fromBytes(textEncoder.encode(text));
  }

  /**
   * Create a buffer holding a copy of the first `count` bytes of `bytes`.
   */
  static fromBytes(bytes: Readonly<Uint8Array>, count: number = bytes.length): GrowableBuffer {
    return new GrowableBuffer(count).append(bytes, count);
  }

  /**
   * Create a buffer holding a copy of the bytes visible through `view`.
   */
  static fromView(view: StringView): GrowableBuffer {
    return GrowableBuffer.fromBytes(view.bytes());
  }

  get length(): number {
    return this.size;
  }

  get capacity(): number {
    return this.storage.length;
  }

  get generation(): number {
    return this.gen;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Checked byte access.
   */
  at(index: number): number {
    this.assertUsable();
    invariant(
      Number.isInteger(index) && index >= 0 && index < this.size,
      'INDEX_OUT_OF_RANGE',
      `Index ${index} is out of range for buffer of length ${this.size}`,
      { index, length: this.size }
    );
    return this.storage[index];
  }

  /**
   * Unchecked byte access. The caller guarantees `0 <= index < length`;
   * otherwise the result is a stale capacity byte or `undefined`.
   */
  unsafeByteAt(index: number): number {
    return this.storage[index];
  }

  /**
   * Zero-copy view of the bytes from `offset` to the end of the buffer.
   * Writing through the returned array writes into the buffer.
   */
  bytesFrom(offset: number): Uint8Array {
    this.assertUsable();
    invariant(
      isValidOffset(offset) && offset <= this.size,
      'OFFSET_OUT_OF_RANGE',
      `Offset ${offset} is past the end of buffer of length ${this.size}`,
      { offset, length: this.size }
    );
    return this.storage.subarray(offset, this.size);
  }

  /**
   * Zero-copy view of the valid portion of the buffer.
   */
  bytes(): Uint8Array {
    return this.bytesFrom(0);
  }

  /**
   * Append the first `count` bytes of `bytes`.
   * Reallocates only when capacity is exceeded.
   */
  append(bytes: Readonly<Uint8Array>, count: number = bytes.length): this {
    this.assertUsable();
    invariant(
      isValidOffset(count) && count <= bytes.length,
      'LENGTH_OUT_OF_RANGE',
      `Cannot append ${count} bytes from a source of ${bytes.length}`,
      { count, available: bytes.length }
    );
    if (count === 0) return this;

    if (this.size + count > this.storage.length) {
      const newSize = Math.max(this.storage.length * 2, this.size + count);
      const newStorage = new Uint8Array(newSize);
      newStorage.set(this.storage.subarray(0, this.size));
      this.storage = newStorage;
    }
    this.storage.set(bytes.subarray(0, count), this.size);
    this.size += count;
    return this;
  }

  appendString(text: string): this {
    return this.append(textEncoder.encode(text));
  }

  /**
   * Shrink the buffer to `length` bytes. Views taken before this call become
   * stale, unless `length` is the current length and nothing changes.
   */
  truncate(length: number): this {
    this.assertUsable();
    invariant(
      isValidOffset(length) && length <= this.size,
      'LENGTH_OUT_OF_RANGE',
      `Cannot truncate buffer of length ${this.size} to ${length}`,
      { requested: length, length: this.size }
    );
    if (length === this.size) return this;
    this.size = length;
    this.gen++;
    return this;
  }

  clear(): this {
    return this.truncate(0);
  }

  /**
   * Release the storage. Every later read, write or view construction fails.
   */
  dispose(): void {
    if (this.disposed) return;
    this.storage = new Uint8Array(0);
    this.size = 0;
    this.disposed = true;
    this.gen++;
  }

  /**
   * Independent copy of the valid bytes.
   */
  clone(): GrowableBuffer {
    return GrowableBuffer.fromBytes(this.bytes());
  }

  equals(other: GrowableBuffer): boolean {
    if (this.size !== other.size) return false;
    const a = this.bytes();
    const b = other.bytes();
    for (let i = 0; i < a.length; i++) {
      if (a[i] !== b[i]) return false;
    }
    return true;
  }

  /**
   * UTF-8 decoding of the valid bytes.
   */
  toString(): string {
    return textDecoder.decode(this.bytes());
  }

  private assertUsable(): void {
    invariant(!this.disposed, 'BUFFER_DISPOSED', 'Buffer has been disposed');
  }
}
