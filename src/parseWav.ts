import { resolve } from 'node:path';
import type { Logger } from 'pino';
import type { ParseOptions, ParseResult, WavParseError } from './types';
import type { ResolvedParseOptions } from './parser/context';
import { type ByteSource, FileByteSource, MemoryByteSource } from './buffer/ByteSource';
import { ByteCursor } from './buffer/ByteCursor';
import { DocumentBuilder } from './core/DocumentBuilder';
import { ErrorFactory } from './core/ErrorFactory';
import { validateContainer } from './parser/validateContainer';
import { walkChunks } from './parser/walkChunks';
import { logger as rootLogger } from './logger';

function resolveLimit(name: string, value: number | undefined): number {
  if (value === undefined) return Number.POSITIVE_INFINITY;
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

export function resolveParseOptions(options: ParseOptions = {}): ResolvedParseOptions {
  return {
    maxChunks: resolveLimit('maxChunks', options.maxChunks),
    maxCuePoints: resolveLimit('maxCuePoints', options.maxCuePoints),
  };
}

function isSystemError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err && typeof err.code === 'string';
}

function ioError(err: NodeJS.ErrnoException, offset: number): WavParseError {
  return { kind: 'IoError', message: err.message, offset };
}

export function logFailure(log: Logger, error: WavParseError): void {
  const { kind, offset, chunkId } = error;
  log.warn({ kind, offset, chunkId }, error.message);
}

function report(log: Logger, result: ParseResult): ParseResult {
  if (result.ok) {
    for (const warning of result.document.warnings) log.debug(warning);
  } else {
    logFailure(log, result.error);
  }
  return result;
}

/**
 * Parses a complete RIFF/WAVE byte source.
 *
 * The source belongs to this call and is closed before it returns, whatever
 * the outcome. Expected failures come back as `{ ok: false }`; only invalid
 * options and programmer errors throw.
 */
export function parseWav(source: ByteSource, options: ParseOptions = {}): ParseResult {
  const cursor = new ByteCursor(source);
  try {
    const resolved = resolveParseOptions(options);
    const log = options.logger ?? rootLogger;
    const errors = new ErrorFactory(cursor);

    try {
      const header = validateContainer(cursor, errors);
      if ('error' in header) return report(log, { ok: false, error: header.error });

      const builder = new DocumentBuilder(header.riffSize);
      const walkError = walkChunks({ cursor, builder, errors, options: resolved });
      if (walkError) return report(log, { ok: false, error: walkError });

      const document = builder.build();
      if (!document) {
        return report(log, {
          ok: false,
          error: errors.create('MissingFormatChunkError', 'Missing required "fmt " chunk'),
        });
      }
      return report(log, { ok: true, document });
    } catch (err) {
      if (isSystemError(err)) return report(log, { ok: false, error: ioError(err, cursor.position) });
      throw err;
    }
  } finally {
    cursor.close();
  }
}

export function parseWavBytes(bytes: Uint8Array, options: ParseOptions = {}): ParseResult {
  return parseWav(new MemoryByteSource(bytes), options);
}

/**
 * Opens `path` and parses it. A file that cannot be opened yields an `IoError`.
 */
export function parseWavFile(path: string, options: ParseOptions = {}): ParseResult {
  const log = options.logger ?? rootLogger;
  log.debug({ path: resolve(path) }, 'Opening file');

  let source: FileByteSource;
  try {
    source = FileByteSource.open(path);
  } catch (err) {
    if (isSystemError(err)) return report(log, { ok: false, error: ioError(err, 0) });
    throw err;
  }
  return parseWav(source, options);
}
