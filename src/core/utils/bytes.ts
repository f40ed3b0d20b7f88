import { Buffer } from 'node:buffer';

/**
 * Returns `bytes` on a buffer of its own.
 * ! Small `Buffer`s are views into a shared pool, and posting a view clones the whole pool.
 */
export function ownBytes(bytes: Uint8Array): Uint8Array {
  if (bytes.byteOffset === 0 && bytes.byteLength === bytes.buffer.byteLength) {
    return bytes;
  }

  return new Uint8Array(bytes);
}

export function encodeOwned(text: string, encoding: BufferEncoding): Uint8Array {
  return ownBytes(Buffer.from(text, encoding));
}

export interface TransferableBytes {
  bytes: Uint8Array;
  /**
   * Backing store of `bytes`, for a `postMessage` transfer list.
   */
  buffer: ArrayBuffer;
}

/**
 * Copies `bytes` onto a fresh buffer that can be transferred instead of cloned.
 */
export function copyForTransfer(bytes: Uint8Array): TransferableBytes {
  const buffer = new ArrayBuffer(bytes.byteLength);
  const copy = new Uint8Array(buffer);
  copy.set(bytes);
  return { bytes: copy, buffer };
}
