import type { ChunkDecoder } from './context';
import { readChunkSize, skipPadByte } from './context';

/**
 * Default route for every tag without a decoder: steps over the payload and
 * its pad byte. Running out of bytes mid-payload is recorded, not fatal; the
 * walk then ends at the next tag read.
 */
export const skipChunk: ChunkDecoder = (ctx) => {
  const header = readChunkSize(ctx);
  if ('error' in header) return header.error;
  const { size } = header;

  const skipped = ctx.cursor.skip(size);
  if (skipped.short) {
    ctx.builder.warn(
      `Chunk "${ctx.id}" at byte ${ctx.offset} appears truncated in stream ` +
        `(${skipped.available}/${size} bytes available)`
    );
    return null;
  }

  if (!skipPadByte(ctx, size)) {
    ctx.builder.warn(`Chunk "${ctx.id}" at byte ${ctx.offset} is missing its pad byte`);
  }
  return null;
};
