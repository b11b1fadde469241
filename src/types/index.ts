/**
 * Type exports for byteview.
 */

export type { BufferContract, Ordering } from './buffer.ts';

// Branded position types
export type { ByteOffset, ByteLength } from './branded.ts';

export {
  byteOffset,
  byteLength,
  isValidOffset,
  addByteOffset,
  remainingLength,
  ZERO_BYTE_OFFSET,
  ZERO_BYTE_LENGTH,
} from './branded.ts';
