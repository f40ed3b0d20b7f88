import type { SyncBodyReader } from '../../types/bridge.js';

/**
 * Sequential reader over an in-memory body.
 */
export function createBufferReader(source: Uint8Array): SyncBodyReader {
  let offset = 0;

  return {
    read(size: number): Uint8Array {
      const end = Math.min(source.byteLength, offset + Math.max(0, size));
      const chunk = source.subarray(offset, end);
      offset = end;
      return chunk;
    },
  };
}
