/**
 * Concatenation helpers that copy a view's bytes without first converting
 * the view to an owned buffer.
 *
 * Neither helper guards against `view` borrowing from the destination
 * itself. That stays valid only because appending never moves existing
 * bytes; callers that swap in another BufferContract must check this.
 */

import type { BufferContract } from '../types/buffer.ts';
import type { GrowableBuffer } from './growable-buffer.ts';
import type { StringView } from './string-view.ts';

/**
 * Append the bytes visible through `view` to `target` (`target += view`).
 *
 * @example
 * ```typescript
 * const target = GrowableBuffer.from('abc');
 * const source = GrowableBuffer.from('cdefg');
 * appendView(target, new StringView(source, 1, 3));
 * target.toString(); // 'abcdef'
 * ```
 */
export function appendView<T extends BufferContract>(target: T, view: StringView): T {
  return target.append(view.bytes(), view.length);
}

/**
 * New buffer holding `lhs` followed by the bytes of `view` (`lhs + view`).
 * `lhs` is left unchanged.
 */
export function concatView(lhs: GrowableBuffer, view: StringView): GrowableBuffer {
  return appendView(lhs.clone(), view);
}
