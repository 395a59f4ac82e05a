export * from './constants';
export * from './types';
export { chunkTag, chunkTagFromBytes, chunkTagToString } from './chunk-tag';
export { type ByteSource, FileByteSource, MemoryByteSource } from './buffer/ByteSource';
export { ByteCursor, type ReadResult, type ShortRead, type SkipResult } from './buffer/ByteCursor';
export { parseWav, parseWavBytes, parseWavFile, resolveParseOptions } from './parseWav';
export { ReaderState } from './core/StateMachine';
export { WavReader } from './WavReader';
export {
  AUDIO_FORMAT_NAMES,
  DEFAULT_FORMAT,
  checkFormatConsistency,
  describeAudioFormat,
  durationSeconds,
  frameCount,
  isSupportedAudioFormat,
} from './utils/format';
export { logger } from './logger';
