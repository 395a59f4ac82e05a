import { closeSync, fstatSync, openSync, readSync } from 'node:fs';

/**
 * A finite, random-access byte provider that a single parse owns exclusively.
 */
export interface ByteSource {
  /** Total number of bytes the source holds. */
  readonly size: number;

  /**
   * Copies bytes starting at `position` into `target`.
   * @returns The number of bytes copied; less than `target.length` only at the end of the source.
   */
  readAt(target: Uint8Array, position: number): number;

  /** Releases the underlying resource. Calling it more than once is a no-op. */
  close(): void;
}

/**
 * Serves bytes from memory. The array is referenced, not copied.
 */
export class MemoryByteSource implements ByteSource {
  private readonly bytes: Uint8Array;

  constructor(bytes: Uint8Array) {
    this.bytes = bytes;
  }

  public get size(): number {
    return this.bytes.length;
  }

  public readAt(target: Uint8Array, position: number): number {
    if (position >= this.bytes.length) return 0;
    const end = Math.min(position + target.length, this.bytes.length);
    target.set(this.bytes.subarray(position, end));
    return end - position;
  }

  public close(): void {}
}

/**
 * Reads a file through a synchronous descriptor.
 */
export class FileByteSource implements ByteSource {
  public readonly size: number;
  private fd: number | null;

  private constructor(fd: number, size: number) {
    this.fd = fd;
    this.size = size;
  }

  /**
   * Opens `path` for reading. Throws the Node system error when the file
   * cannot be opened or inspected.
   */
  public static open(path: string): FileByteSource {
    const fd = openSync(path, 'r');
    try {
      return new FileByteSource(fd, fstatSync(fd).size);
    } catch (err) {
      closeSync(fd);
      throw err;
    }
  }

  public readAt(target: Uint8Array, position: number): number {
    if (this.fd === null) throw new Error('FileByteSource is closed');

    let filled = 0;
    while (filled < target.length) {
      const n = readSync(this.fd, target, filled, target.length - filled, position + filled);
      if (n === 0) break;
      filled += n;
    }
    return filled;
  }

  public close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    closeSync(fd);
  }
}
