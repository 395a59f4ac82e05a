import type {
  CueTable,
  FactInfo,
  FormatDescriptor,
  ParseOptions,
  ParseResult,
  SampleBlock,
  WavDocument,
  WavFormatCode,
  WavParseError,
} from './types';
import { ReaderState, ReaderStateMachine } from './core/StateMachine';
import { logFailure, parseWavFile, resolveParseOptions } from './parseWav';
import { logger as rootLogger } from './logger';

/**
 * Reads RIFF/WAVE files from disk and exposes the decoded chunks.
 *
 * ```ts
 * const reader = new WavReader('loop.wav');
 * if (reader.open()) {
 *   console.log(reader.channelCount, reader.sampleRate);
 * } else {
 *   console.error(reader.lastError?.message);
 * }
 * ```
 *
 * Accessors throw until `open` has succeeded.
 */
export class WavReader {
  private path: string;
  private readonly options: ParseOptions;
  private readonly machine = new ReaderStateMachine();
  private _document: WavDocument | null = null;
  private _lastError: WavParseError | null = null;

  constructor(path = '', options: ParseOptions = {}) {
    resolveParseOptions(options);
    this.path = path;
    this.options = options;
  }

  /**
   * Parses `path`, or the path given to the constructor. Any earlier result
   * is discarded first.
   * @returns Whether the file was parsed successfully.
   */
  public open(path?: string): boolean {
    if (path !== undefined) this.path = path;
    if (this.machine.state !== ReaderState.IDLE) this.machine.transition(ReaderState.IDLE);
    this._document = null;
    this._lastError = null;

    this.machine.transition(ReaderState.PARSING);
    if (this.path === '') {
      this._lastError = { kind: 'IoError', message: 'No file path given', offset: 0 };
      logFailure(this.options.logger ?? rootLogger, this._lastError);
      this.machine.transition(ReaderState.FAILED);
      return false;
    }

    let result: ParseResult;
    try {
      result = parseWavFile(this.path, this.options);
    } catch (err) {
      this.machine.transition(ReaderState.FAILED);
      throw err;
    }
    if (!result.ok) {
      this._lastError = result.error;
      this.machine.transition(ReaderState.FAILED);
      return false;
    }

    this._document = result.document;
    this.machine.transition(ReaderState.OPEN);
    return true;
  }

  public get isOpen(): boolean {
    return this.machine.state === ReaderState.OPEN;
  }

  public get state(): ReaderState {
    return this.machine.state;
  }

  /** Why the last `open` failed; `null` after a success or before any attempt. */
  public get lastError(): WavParseError | null {
    return this._lastError;
  }

  public get document(): WavDocument {
    if (!this._document) throw new Error('WavReader is not open');
    return this._document;
  }

  public get format(): FormatDescriptor {
    return this.document.format;
  }

  public get channelCount(): number {
    return this.format.channelCount;
  }

  public get sampleRate(): number {
    return this.format.sampleRate;
  }

  public get bitsPerSample(): number {
    return this.format.bitsPerSample;
  }

  public get audioFormat(): WavFormatCode {
    return this.format.audioFormatCode;
  }

  public get data(): SampleBlock | null {
    return this.document.data;
  }

  public get fact(): FactInfo | null {
    return this.document.fact;
  }

  public get cue(): CueTable | null {
    return this.document.cue;
  }

  /** The sample bytes exactly as stored in the file; empty when there is no "data" chunk. */
  public get rawSampleData(): Uint8Array {
    return this.document.data?.bytes ?? new Uint8Array(0);
  }
}
