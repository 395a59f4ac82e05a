import type { ByteCursor } from '../buffer/ByteCursor';
import type { ErrorFactory } from '../core/ErrorFactory';
import type { WavParseError } from '../types';
import { ID_RIFF, ID_WAVE, RIFF_HEADER_SIZE } from '../constants';
import { chunkTagFromBytes } from '../chunk-tag';

/**
 * Reads and checks the 12-byte RIFF header. The RIFF size field is handed
 * back as-is; truncated or over-long files surface later, chunk by chunk.
 */
export function validateContainer(
  cursor: ByteCursor,
  errors: ErrorFactory
): { riffSize: number } | { error: WavParseError } {
  const header = cursor.readExact(RIFF_HEADER_SIZE);
  if (header.short) {
    return {
      error: errors.create(
        'ContainerFormatError',
        `File is too small to be a valid WAV (expected at least ${RIFF_HEADER_SIZE} bytes, got ${header.available})`
      ),
    };
  }

  const { bytes } = header;
  if (chunkTagFromBytes(bytes, 0) !== ID_RIFF) {
    return { error: errors.create('ContainerFormatError', 'Missing RIFF signature at byte 0') };
  }
  if (chunkTagFromBytes(bytes, 8) !== ID_WAVE) {
    return { error: errors.create('ContainerFormatError', 'Missing "WAVE" signature at byte 8') };
  }

  const riffSize = new DataView(bytes.buffer, bytes.byteOffset, RIFF_HEADER_SIZE).getUint32(4, true);
  return { riffSize };
}
