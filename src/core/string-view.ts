/**
 * Non-owning view over a byte range of a buffer.
 *
 * A StringView is a (buffer, offset, length) triple. It holds no bytes of
 * its own: every read goes through the buffer it was built from, and it
 * never mutates or outlives that buffer. Construction validates the range
 * once; reads trust it afterwards.
 *
 * Lifetime is tracked by generation. A view records its buffer's
 * generation when built and every byte read compares the two, so a view
 * used after its buffer was truncated, cleared or disposed throws
 * `STALE_VIEW` instead of reading bytes that moved.
 *
 * ```typescript
 * const buf = GrowableBuffer.from('foo-bar-baz');
 * const view = new StringView(buf, 4, 3);
 * view.equals('bar');        // true
 * view.toOwned().toString(); // 'bar'
 * ```
 */

import type { BufferContract, Ordering } from '../types/buffer.ts';
import {
  addByteOffset,
  byteLength,
  byteOffset,
  isValidOffset,
  remainingLength,
  ZERO_BYTE_LENGTH,
  ZERO_BYTE_OFFSET,
  type ByteLength,
  type ByteOffset,
} from '../types/branded.ts';
import { getViewConfig } from './config.ts';
import { textDecoder, textEncoder } from './encoding.ts';
import { invariant } from './errors.ts';
import { GrowableBuffer } from './growable-buffer.ts';

/**
 * Anything a view can be compared against with `equals`.
 * - StringView: byte-content equality
 * - BufferContract: the whole buffer
 * - string / Uint8Array / null / undefined: zero-terminated string
 * - number: a single byte
 */
export type ViewOperand = StringView | BufferContract | string | Uint8Array | number | null | undefined;

const EMPTY_BYTES = new Uint8Array(0);

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

export class StringView {
  /** Borrowed buffer, or null for an absent view */
  readonly buffer: BufferContract | null;
  readonly offset: ByteOffset;
  readonly length: ByteLength;
  /** Buffer generation when this view (or the view it copies) was built */
  private readonly generation: number;

  constructor();
  constructor(source: StringView);
  constructor(buffer: BufferContract, offset?: number, length?: number);
  constructor(source?: BufferContract | StringView, offset?: number, length?: number) {
    if (source === undefined) {
      this.buffer = null;
      this.offset = ZERO_BYTE_OFFSET;
      this.length = ZERO_BYTE_LENGTH;
      this.generation = 0;
      return;
    }

    if (source instanceof StringView) {
      this.buffer = source.buffer;
      this.offset = source.offset;
      this.length = source.length;
      this.generation = source.generation;
      return;
    }

    invariant(!source.isDisposed, 'BUFFER_DISPOSED', 'Cannot view a disposed buffer');

    const start = offset ?? 0;
    invariant(
      isValidOffset(start) && start <= source.length,
      'OFFSET_OUT_OF_RANGE',
      `Offset ${start} is past the end of buffer of length ${source.length}`,
      { offset: start, bufferLength: source.length }
    );

    const available = remainingLength(source.length, byteOffset(start));
    const size = length ?? available;
    invariant(
      isValidOffset(size) && size <= available,
      'LENGTH_OUT_OF_RANGE',
      `Length ${size} at offset ${start} overruns buffer of length ${source.length}`,
      { offset: start, length: size, bufferLength: source.length }
    );

    this.buffer = source;
    this.offset = byteOffset(start);
    this.length = byteLength(size);
    this.generation = source.generation;
  }

  /**
   * Copy constructor in static form.
   */
  static copy(view: StringView): StringView {
    return new StringView(view);
  }

  /**
   * Three-way comparison usable as an `Array.prototype.sort` callback.
   */
  static compare(a: StringView, b: StringView): Ordering {
    return a.cmp(b);
  }

  // ===========================================================================
  // Accessors
  // ===========================================================================

  /** Alias of `length` */
  get size(): ByteLength {
    return this.length;
  }

  isEmpty(): boolean {
    return this.length === 0;
  }

  isAbsent(): boolean {
    return this.buffer === null;
  }

  /**
   * Checked byte access.
   *
   * The check is the buffer's: `offset + index` must lie inside the buffer,
   * which may extend past the end of this view.
   */
  at(index: number): number {
    const buffer = this.liveBuffer();
    invariant(
      isValidOffset(index),
      'INDEX_OUT_OF_RANGE',
      `Index ${index} is not a valid byte index`,
      { index }
    );
    return buffer.at(addByteOffset(this.offset, index));
  }

  /**
   * Unchecked byte access.
   *
   * WARNING: `index` is not checked against this view's length nor the
   * buffer's. The caller guarantees `0 <= index < length`.
   */
  byteAt(index: number): number {
    return this.liveBuffer().unsafeByteAt(addByteOffset(this.offset, index));
  }

  /**
   * Zero-copy bytes from this view's offset to the end of the buffer.
   *
   * WARNING: the returned array does not stop at `length`. It covers
   * everything after the view's start, so callers must bound reads by
   * `length` themselves.
   */
  dangerousUnderlyingBytes(): Readonly<Uint8Array> {
    return this.liveBuffer().bytesFrom(this.offset);
  }

  /**
   * Zero-copy, read-only bytes of exactly the visible range. Empty for an
   * absent view.
   */
  bytes(): Readonly<Uint8Array> {
    if (this.buffer === null) return EMPTY_BYTES;
    return this.dangerousUnderlyingBytes().subarray(0, this.length);
  }

  /**
   * View of `length` bytes starting `start` bytes into this view.
   */
  subview(start: number, length?: number): StringView {
    invariant(
      isValidOffset(start) && start <= this.length,
      'OFFSET_OUT_OF_RANGE',
      `Offset ${start} is past the end of view of length ${this.length}`,
      { offset: start, viewLength: this.length }
    );
    const size = length ?? this.length - start;
    invariant(
      isValidOffset(size) && size <= this.length - start,
      'LENGTH_OUT_OF_RANGE',
      `Length ${size} at offset ${start} overruns view of length ${this.length}`,
      { offset: start, length: size, viewLength: this.length }
    );
    if (this.buffer === null) return new StringView();
    return new StringView(this.liveBuffer(), addByteOffset(this.offset, start), size);
  }

  // ===========================================================================
  // Equality
  // ===========================================================================

  /**
   * Compare against any supported operand, dispatching on its type.
   */
  equals(other: ViewOperand): boolean {
    if (other instanceof StringView) return this.equalsView(other);
    if (typeof other === 'number') return this.equalsChar(other);
    if (
      typeof other === 'string' ||
      other === null ||
      other === undefined ||
      other instanceof Uint8Array
    ) {
      return this.equalsCString(other);
    }
    return this.equalsBuffer(other);
  }

  notEquals(other: ViewOperand): boolean {
    return !this.equals(other);
  }

  /**
   * Compare against a zero-terminated string. Bytes after the first NUL in
   * `other` are ignored; null and undefined count as the empty string.
   */
  equalsCString(other: string | Uint8Array | null | undefined): boolean {
    if (other === null || other === undefined) return this.length === 0;
    const encoded = typeof other === 'string' ? textEncoder.encode(other) : other;
    const terminator = encoded.indexOf(0);
    const cstr = terminator === -1 ? encoded : encoded.subarray(0, terminator);

    if (this.length !== cstr.length) return false;
    if (this.length === 0) return true;
    return bytesEqual(this.bytes(), cstr);
  }

  /**
   * True iff this view holds exactly one byte and it equals `ch`.
   *
   * A number is a byte in either signed (-128..127) or unsigned (0..255)
   * form, so -1 matches 0xFF. A string operand must be a single UTF-16 unit.
   */
  equalsChar(ch: number | string): boolean {
    if (this.length !== 1) return false;
    return this.bytes()[0] === toByte(ch);
  }

  equalsView(other: StringView): boolean {
    if (this.length !== other.length) return false;
    if (this.length === 0) return true;
    if (
      this.buffer === other.buffer &&
      this.offset === other.offset &&
      this.generation === other.generation
    ) {
      return true;
    }
    return bytesEqual(this.bytes(), other.bytes());
  }

  /**
   * Equivalent to comparing against a whole-buffer view of `buffer`.
   */
  equalsBuffer(buffer: BufferContract): boolean {
    return this.equalsView(new StringView(buffer));
  }

  // ===========================================================================
  // Ordering
  // ===========================================================================

  /**
   * Lexicographic comparison over unsigned bytes.
   * A view that is a strict prefix of the other orders first.
   */
  cmp(other: StringView | BufferContract): Ordering {
    const that = other instanceof StringView ? other : new StringView(other);
    if (this.length === 0) return that.length === 0 ? 0 : -1;

    const a = this.bytes();
    const b = that.bytes();
    const shared = Math.min(a.length, b.length);
    for (let i = 0; i < shared; i++) {
      if (a[i] < b[i]) return -1;
      if (a[i] > b[i]) return 1;
    }
    if (a.length === b.length) return 0;
    return a.length < b.length ? -1 : 1;
  }

  /**
   * FNV-1a over the visible bytes. Equal views hash equally, absent and
   * empty views included.
   */
  hash(): number {
    let h = FNV_OFFSET_BASIS;
    const bytes = this.bytes();
    for (let i = 0; i < bytes.length; i++) {
      h ^= bytes[i];
      h = Math.imul(h, FNV_PRIME);
    }
    return h >>> 0;
  }

  // ===========================================================================
  // Conversion
  // ===========================================================================

  /**
   * Fresh owned copy of the visible bytes. Never aliases the source buffer.
   */
  toOwned(): GrowableBuffer {
    return GrowableBuffer.fromBytes(this.bytes());
  }

  /** Same as `toOwned` */
  clone(): GrowableBuffer {
    return this.toOwned();
  }

  /**
   * UTF-8 decoding of the visible bytes. Allocates a JS string, not a buffer.
   */
  toString(): string {
    return textDecoder.decode(this.bytes());
  }

  toJSON(): string {
    return this.toString();
  }

  private liveBuffer(): BufferContract {
    const buffer = this.buffer;
    invariant(buffer !== null, 'ABSENT_BUFFER', 'View has no backing buffer');
    if (getViewConfig().detectStaleViews) {
      invariant(
        buffer.generation === this.generation,
        'STALE_VIEW',
        'View outlived a truncation, clear or disposal of its buffer',
        {
          viewGeneration: this.generation,
          bufferGeneration: buffer.generation,
          offset: this.offset,
          length: this.length,
        }
      );
    }
    return buffer;
  }
}

/**
 * Byte value of a character operand, or -1 when it cannot be a byte.
 */
function toByte(ch: number | string): number {
  if (typeof ch === 'string') return ch.length === 1 ? ch.charCodeAt(0) : -1;
  if (!Number.isInteger(ch) || ch < -128 || ch > 0xff) return -1;
  return ch & 0xff;
}

function bytesEqual(a: Readonly<Uint8Array>, b: Readonly<Uint8Array>): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}
