import type { WavErrorKind, WavParseError } from '../types';
import type { ByteCursor } from '../buffer/ByteCursor';

/**
 * Creates standardized WavParseError objects using the cursor position as context.
 */
export class ErrorFactory {
  private readonly cursor: ByteCursor;

  constructor(cursor: ByteCursor) {
    this.cursor = cursor;
  }

  public create(kind: WavErrorKind, message: string, chunkId?: string): WavParseError {
    const error: WavParseError = { kind, message, offset: this.cursor.position };
    return chunkId === undefined ? error : { ...error, chunkId };
  }

  /** Error for a short read of a fixed-size field inside a known chunk. */
  public shortField(chunkId: string, field: string, requested: number, available: number): WavParseError {
    return this.create(
      'ChunkFormatError',
      `Unexpected end of file in "${chunkId}" chunk while reading ${field}. ` +
        `Expected ${requested} bytes, but only ${available} byte${available !== 1 ? 's' : ''} available.`,
      chunkId
    );
  }
}
