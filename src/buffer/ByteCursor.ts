import type { ByteSource } from './ByteSource';

export interface ShortRead {
  readonly short: true;
  readonly requested: number;
  readonly available: number;
  /** The bytes that were available; `available` long. */
  readonly partial: Uint8Array;
}

export type ReadResult = { readonly short: false; readonly bytes: Uint8Array } | ShortRead;

export type SkipResult =
  | { readonly short: false }
  | { readonly short: true; readonly requested: number; readonly available: number };

/**
 * A sequential, forward-only reader over a {@link ByteSource}.
 *
 * Running out of bytes is reported in the result, never thrown. A short read or
 * skip still consumes whatever was left, so the cursor ends up at the end of
 * the source.
 */
export class ByteCursor {
  private readonly source: ByteSource;
  private pos: number;
  private closed = false;

  constructor(source: ByteSource, start = 0) {
    this.source = source;
    this.pos = start;
  }

  public get position(): number {
    return this.pos;
  }

  public get remaining(): number {
    return Math.max(0, this.source.size - this.pos);
  }

  public readExact(length: number): ReadResult {
    this.assertOpen();
    const available = Math.min(length, this.remaining);
    const bytes = new Uint8Array(available);
    const got = available > 0 ? this.source.readAt(bytes, this.pos) : 0;
    this.pos += got;

    if (got < length) {
      return { short: true, requested: length, available: got, partial: bytes.subarray(0, got) };
    }
    return { short: false, bytes };
  }

  public skip(length: number): SkipResult {
    this.assertOpen();
    const available = Math.min(length, this.remaining);
    this.pos += available;

    if (available < length) {
      return { short: true, requested: length, available };
    }
    return { short: false };
  }

  /** Little-endian u16, or `null` when fewer than 2 bytes remain. */
  public readUint16(): number | null {
    const read = this.readExact(2);
    if (read.short) return null;
    return new DataView(read.bytes.buffer, read.bytes.byteOffset, 2).getUint16(0, true);
  }

  /** Little-endian u32, or `null` when fewer than 4 bytes remain. */
  public readUint32(): number | null {
    const read = this.readExact(4);
    if (read.short) return null;
    return new DataView(read.bytes.buffer, read.bytes.byteOffset, 4).getUint32(0, true);
  }

  public close(): void {
    if (this.closed) return;
    this.closed = true;
    this.source.close();
  }

  private assertOpen(): void {
    if (this.closed) throw new Error('ByteCursor is closed');
  }
}
