import type { ChunkTag, CuePoint, FormatDescriptor, WavParseError } from '../types';
import type { ChunkContext, ChunkDecoder } from './context';
import { readChunkSize, skipPadByte } from './context';
import { CUE_POINT_SIZE, FMT_CHUNK_MIN_SIZE, ID_CUE, ID_DATA, ID_FACT, ID_FMT } from '../constants';
import { chunkTagFromBytes, chunkTagToString } from '../chunk-tag';
import { checkFormatConsistency, formatCodeHex, isSupportedAudioFormat } from '../utils/format';

/**
 * Reads the fixed 16-byte "fmt " body, then steps over any format extension.
 */
export const decodeFormatChunk: ChunkDecoder = (ctx) => {
  const header = readChunkSize(ctx);
  if ('error' in header) return header.error;
  const { size } = header;

  const body = ctx.cursor.readExact(FMT_CHUNK_MIN_SIZE);
  if (body.short) {
    return ctx.errors.shortField(ctx.id, 'the format fields', FMT_CHUNK_MIN_SIZE, body.available);
  }

  const view = new DataView(body.bytes.buffer, body.bytes.byteOffset, FMT_CHUNK_MIN_SIZE);
  const format: FormatDescriptor = {
    declaredSize: size,
    audioFormatCode: view.getUint16(0, true),
    channelCount: view.getUint16(2, true),
    sampleRate: view.getUint32(4, true),
    byteRate: view.getUint32(8, true),
    blockAlign: view.getUint16(12, true),
    bitsPerSample: view.getUint16(14, true),
  };

  if (size < FMT_CHUNK_MIN_SIZE) {
    ctx.builder.warn(
      `"fmt " chunk at byte ${ctx.offset} declares ${size} bytes; ` +
        `read the ${FMT_CHUNK_MIN_SIZE}-byte minimum regardless`
    );
  } else if (size > FMT_CHUNK_MIN_SIZE) {
    const extension = ctx.cursor.skip(size - FMT_CHUNK_MIN_SIZE);
    if (extension.short) {
      ctx.builder.warn(
        `"fmt " extension at byte ${ctx.offset} appears truncated in stream ` +
          `(${extension.available}/${extension.requested} bytes available)`
      );
    } else if (!skipPadByte(ctx, size)) {
      ctx.builder.warn(`Chunk "fmt " at byte ${ctx.offset} is missing its pad byte`);
    }
  }

  if (ctx.builder.hasFormat) {
    ctx.builder.warn(`Duplicate "fmt " chunk at byte ${ctx.offset} replaces the earlier format`);
  }
  for (const finding of checkFormatConsistency(format)) {
    ctx.builder.warn(finding);
  }

  ctx.builder.setFormat(format);
  return null;
};

/**
 * Copies the sample bytes as-is, tagged with the format in effect right now.
 */
export const decodeDataChunk: ChunkDecoder = (ctx) => {
  const header = readChunkSize(ctx);
  if ('error' in header) return header.error;
  const { size } = header;

  const { audioFormatCode, bitsPerSample } = ctx.builder.currentFormat;
  if (!isSupportedAudioFormat(audioFormatCode)) {
    return ctx.errors.create(
      'UnsupportedAudioFormatError',
      `Unsupported audio format ${formatCodeHex(audioFormatCode)} (only PCM 0x0001 and IEEE float 0x0003 are supported)`,
      ctx.id
    );
  }

  const offset = ctx.cursor.position;
  let bytes: Uint8Array = new Uint8Array(0);
  if (size > 0) {
    const payload = ctx.cursor.readExact(size);
    if (payload.short) {
      return ctx.errors.create(
        'TruncatedPayloadError',
        `Failed to read complete "data" chunk. Expected ${size} bytes, got ${payload.available}`,
        ctx.id
      );
    }
    bytes = payload.bytes;
  }

  if (!skipPadByte(ctx, size)) {
    ctx.builder.warn(`Chunk "data" at byte ${ctx.offset} is missing its pad byte`);
  }

  ctx.builder.setData({ declaredSize: size, offset, bytes, audioFormatCode, bitsPerSample });
  return null;
};

/**
 * Reads the per-channel sample count. Bytes past the first four are left in
 * place, so the next tag is read from wherever they start.
 */
export const decodeFactChunk: ChunkDecoder = (ctx) => {
  const header = readChunkSize(ctx);
  if ('error' in header) return header.error;
  const { size } = header;

  const sampleCountPerChannel = ctx.cursor.readUint32();
  if (sampleCountPerChannel === null) {
    return ctx.errors.shortField(ctx.id, 'the sample count', 4, ctx.cursor.position - ctx.offset - 8);
  }

  if (size > 4) {
    ctx.builder.warn(`"fact" chunk at byte ${ctx.offset} declares ${size} bytes; ${size - 4} were left unread`);
  }

  ctx.builder.setFact({ declaredSize: size, sampleCountPerChannel });
  return null;
};

function readCuePoint(ctx: ChunkContext, index: number): CuePoint | WavParseError {
  const start = ctx.cursor.position;
  const shortRecord = () =>
    ctx.errors.shortField(ctx.id, `cue point ${index}`, CUE_POINT_SIZE, ctx.cursor.position - start);

  const head = ctx.cursor.readExact(12);
  if (head.short) return shortRecord();

  const headView = new DataView(head.bytes.buffer, head.bytes.byteOffset, 12);
  const targetTag: ChunkTag = chunkTagFromBytes(head.bytes, 8);
  if (targetTag !== ID_DATA) {
    return ctx.errors.create(
      'UnsupportedCueTargetError',
      `Cue point ${index} refers to chunk "${chunkTagToString(targetTag)}"; only "data" is supported`,
      ctx.id
    );
  }

  const tail = ctx.cursor.readExact(12);
  if (tail.short) return shortRecord();

  const tailView = new DataView(tail.bytes.buffer, tail.bytes.byteOffset, 12);
  return {
    identifier: headView.getUint32(0, true),
    position: headView.getUint32(4, true),
    targetTag,
    chunkStart: tailView.getUint32(0, true),
    blockStart: tailView.getUint32(4, true),
    sampleOffset: tailView.getUint32(8, true),
  };
}

/**
 * Reads exactly as many cue records as the chunk announces.
 */
export const decodeCueChunk: ChunkDecoder = (ctx) => {
  const header = readChunkSize(ctx);
  if ('error' in header) return header.error;
  const { size } = header;

  const count = ctx.cursor.readUint32();
  if (count === null) {
    return ctx.errors.shortField(ctx.id, 'the cue point count', 4, ctx.cursor.position - ctx.offset - 8);
  }
  if (count > ctx.options.maxCuePoints) {
    return ctx.errors.create(
      'ChunkFormatError',
      `"cue " chunk announces ${count} cue points, more than the configured limit of ${ctx.options.maxCuePoints}`,
      ctx.id
    );
  }

  const points: CuePoint[] = [];
  for (let i = 0; i < count; i++) {
    const point = readCuePoint(ctx, i);
    if ('kind' in point) return point;
    points.push(point);
  }

  ctx.builder.setCue({ declaredSize: size, count, points });
  return null;
};

/**
 * Decoders keyed by tag. Tags without an entry go to the generic skip.
 */
export const CHUNK_DECODERS: ReadonlyMap<ChunkTag, ChunkDecoder> = new Map<ChunkTag, ChunkDecoder>([
  [ID_FMT, decodeFormatChunk],
  [ID_DATA, decodeDataChunk],
  [ID_FACT, decodeFactChunk],
  [ID_CUE, decodeCueChunk],
]);
