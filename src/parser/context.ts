import type { ByteCursor } from '../buffer/ByteCursor';
import type { DocumentBuilder } from '../core/DocumentBuilder';
import type { ErrorFactory } from '../core/ErrorFactory';
import type { ChunkTag, WavParseError } from '../types';
import { chunkTagToString } from '../chunk-tag';

export interface ResolvedParseOptions {
  maxChunks: number;
  maxCuePoints: number;
}

/**
 * Everything a chunk decoder needs. The cursor sits just past the chunk tag,
 * on the size field.
 */
export interface ChunkContext {
  readonly cursor: ByteCursor;
  readonly builder: DocumentBuilder;
  readonly errors: ErrorFactory;
  readonly options: ResolvedParseOptions;
  readonly tag: ChunkTag;
  readonly id: string;
  /** Byte position of the chunk tag. */
  readonly offset: number;
}

/** Returns `null` once the chunk is consumed, or the error that ends the parse. */
export type ChunkDecoder = (ctx: ChunkContext) => WavParseError | null;

export function createChunkContext(
  base: Omit<ChunkContext, 'tag' | 'id' | 'offset'>,
  tag: ChunkTag,
  offset: number
): ChunkContext {
  return { ...base, tag, id: chunkTagToString(tag), offset };
}

/**
 * Reads the size field that follows every tag and records the chunk.
 */
export function readChunkSize(ctx: ChunkContext): { size: number } | { error: WavParseError } {
  const size = ctx.cursor.readUint32();
  if (size === null) {
    return { error: ctx.errors.shortField(ctx.id, 'the chunk size', 4, ctx.cursor.position - ctx.offset - 4) };
  }
  ctx.builder.addChunk({ id: ctx.id, tag: ctx.tag, offset: ctx.offset, size });
  return { size };
}

/**
 * Skips the pad byte that follows an odd-sized payload.
 * @returns Whether the pad byte was present.
 */
export function skipPadByte(ctx: ChunkContext, size: number): boolean {
  if ((size & 1) === 0) return true;
  return !ctx.cursor.skip(1).short;
}
