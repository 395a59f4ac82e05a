import type { Logger } from 'pino';

/**
 * The four raw bytes of a chunk identifier, packed big-endian into an unsigned
 * 32-bit integer (`"fmt "` is `0x666d7420`). Bytes need not be printable.
 */
export type ChunkTag = number;

/**
 * Identifier for the audio encoding format in a WAVE file header.
 * - `1`: PCM (uncompressed)
 * - `3`: IEEE Float
 *
 * Any other code is carried through from the file but rejected once a "data"
 * chunk has to be interpreted with it.
 */
export type WavFormatCode = 1 | 3 | (number & {});

/**
 * Audio encoding parameters from the "fmt " chunk.
 * @property declaredSize - Size field of the chunk; 16 for plain PCM, larger when an extension follows.
 * @property audioFormatCode - The numeric code for the audio format (e.g., PCM, IEEE Float).
 * @property channelCount - The number of interleaved channels.
 * @property sampleRate - Samples per second per channel, in Hertz.
 * @property byteRate - The average byte rate of the audio stream (`sampleRate * blockAlign`).
 * @property blockAlign - The size in bytes of one frame across all channels.
 * @property bitsPerSample - The number of bits per audio sample.
 */
export interface FormatDescriptor {
  readonly declaredSize: number;
  readonly audioFormatCode: WavFormatCode;
  readonly channelCount: number;
  readonly sampleRate: number;
  readonly byteRate: number;
  readonly blockAlign: number;
  readonly bitsPerSample: number;
}

/**
 * The raw payload of a "data" chunk.
 *
 * `audioFormatCode` and `bitsPerSample` echo the format descriptor that was in
 * effect when the chunk was decoded, which is the default descriptor if no
 * "fmt " chunk had been seen yet.
 */
export interface SampleBlock {
  /** Payload size in bytes, pad byte excluded. */
  readonly declaredSize: number;
  /** Absolute byte offset of the first sample byte. */
  readonly offset: number;
  /** Exactly `declaredSize` bytes in file order, not deinterleaved. Each read returns a fresh copy. */
  readonly bytes: Uint8Array;
  readonly audioFormatCode: WavFormatCode;
  readonly bitsPerSample: number;
}

export interface FactInfo {
  readonly declaredSize: number;
  readonly sampleCountPerChannel: number;
}

export interface CuePoint {
  readonly identifier: number;
  /** Play-order position. */
  readonly position: number;
  /** Chunk the point refers to; always the "data" tag for stored points. */
  readonly targetTag: ChunkTag;
  readonly chunkStart: number;
  readonly blockStart: number;
  /** Sample-accurate offset into the data chunk. */
  readonly sampleOffset: number;
}

export interface CueTable {
  readonly declaredSize: number;
  /** Count as read from the chunk. */
  readonly count: number;
  readonly points: readonly CuePoint[];
}

/**
 * Metadata for a single chunk visited during the walk.
 * @property id - The four-character identifier of the chunk (e.g., 'fmt ', 'data').
 * @property tag - The same identifier as a {@link ChunkTag}.
 * @property offset - The byte position of the chunk tag in the file.
 * @property size - The declared size of the chunk's payload in bytes.
 */
export interface ChunkInfo {
  readonly id: string;
  readonly tag: ChunkTag;
  readonly offset: number;
  readonly size: number;
}

/** The immutable result of a successful parse. */
export interface WavDocument {
  /** RIFF size field from the container header, not checked against the stream. */
  readonly riffSize: number;
  readonly format: FormatDescriptor;
  readonly data: SampleBlock | null;
  readonly fact: FactInfo | null;
  readonly cue: CueTable | null;
  /** Every chunk visited, in file order. */
  readonly chunks: readonly ChunkInfo[];
  /** Non-fatal findings collected during the walk. */
  readonly warnings: readonly string[];
}

export type WavErrorKind =
  | 'IoError'
  | 'ContainerFormatError'
  | 'ChunkFormatError'
  | 'UnsupportedAudioFormatError'
  | 'TruncatedPayloadError'
  | 'UnsupportedCueTargetError'
  | 'MissingFormatChunkError';

/**
 * Describes why a parse failed. Every error is fatal to the parse.
 * @property kind - The failure category.
 * @property message - A descriptive message explaining the error.
 * @property offset - The cursor position when the failure was detected.
 * @property chunkId - The chunk being decoded, when there was one.
 */
export interface WavParseError {
  readonly kind: WavErrorKind;
  readonly message: string;
  readonly offset: number;
  readonly chunkId?: string;
}

export type ParseResult = { readonly ok: true; readonly document: WavDocument } | { readonly ok: false; readonly error: WavParseError };

/**
 * Configuration for a parse.
 * @property maxChunks - Stop walking after this many chunks. Unbounded by default.
 * @property maxCuePoints - Reject a "cue " chunk announcing more points than this. Unbounded by default.
 * @property logger - Logger to use instead of the package's root logger.
 */
export interface ParseOptions {
  maxChunks?: number;
  maxCuePoints?: number;
  logger?: Logger;
}
