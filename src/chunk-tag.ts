import type { ChunkTag } from './types';

/**
 * Packs four raw bytes into a {@link ChunkTag}. Byte order is preserved, so two
 * tags compare equal exactly when their bytes do.
 */
export function chunkTagFromBytes(bytes: Uint8Array, offset = 0): ChunkTag {
  if (bytes.length - offset < 4) {
    throw new RangeError(`A chunk tag needs 4 bytes, got ${Math.max(0, bytes.length - offset)}`);
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset + offset, 4);
  return view.getUint32(0, false);
}

/** Tag for a four-character code such as `'fmt '`. */
export function chunkTag(fourCC: string): ChunkTag {
  if (fourCC.length !== 4) {
    throw new RangeError(`A FourCC must be exactly 4 characters, got "${fourCC}"`);
  }
  const bytes = new Uint8Array(4);
  for (let i = 0; i < 4; i++) bytes[i] = fourCC.charCodeAt(i) & 0xff;
  return chunkTagFromBytes(bytes);
}

export function chunkTagToString(tag: ChunkTag): string {
  return String.fromCharCode((tag >>> 24) & 0xff, (tag >>> 16) & 0xff, (tag >>> 8) & 0xff, tag & 0xff);
}
