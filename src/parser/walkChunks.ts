import type { WavParseError } from '../types';
import type { ChunkContext } from './context';
import { createChunkContext } from './context';
import { CHUNK_TAG_SIZE } from '../constants';
import { chunkTagFromBytes } from '../chunk-tag';
import { CHUNK_DECODERS } from './decoders';
import { skipChunk } from './skipChunk';

/**
 * Walks the chunk sequence that follows the container header until the
 * stream ends, routing each chunk to its decoder or to {@link skipChunk}.
 *
 * The cursor is expected to sit on a chunk tag on entry and after every chunk.
 * A tag read that comes back short ends the walk; that is the only normal way
 * out besides the `maxChunks` limit. Whether a "fmt " chunk was seen is left
 * to `DocumentBuilder.build`.
 */
export function walkChunks(base: Omit<ChunkContext, 'tag' | 'id' | 'offset'>): WavParseError | null {
  const { cursor, builder, options } = base;
  let chunkCount = 0;

  for (;;) {
    const offset = cursor.position;
    const tagRead = cursor.readExact(CHUNK_TAG_SIZE);
    if (tagRead.short) {
      if (tagRead.available > 0) {
        builder.warn(
          `Ignored ${tagRead.available} trailing byte${tagRead.available !== 1 ? 's' : ''} at byte ${offset}; ` +
            `too short for a chunk tag`
        );
      }
      break;
    }

    if (chunkCount >= options.maxChunks) {
      builder.warn(`Chunk limit of ${options.maxChunks} reached; bytes from ${offset} on were not examined`);
      break;
    }

    const tag = chunkTagFromBytes(tagRead.bytes);
    const decode = CHUNK_DECODERS.get(tag) ?? skipChunk;
    const error = decode(createChunkContext(base, tag, offset));
    if (error) return error;
    chunkCount++;
  }
  return null;
}
