/**
 * Shared TextEncoder/TextDecoder singletons.
 */

export const textEncoder = new TextEncoder();
export const textDecoder = new TextDecoder();
