import type { ChunkInfo, CueTable, FactInfo, FormatDescriptor, SampleBlock, WavDocument } from '../types';
import { DEFAULT_FORMAT } from '../utils/format';

/** Typed arrays cannot be frozen, so the sample bytes are handed out as copies. */
function freezeSampleBlock(block: SampleBlock): SampleBlock {
  const { bytes, ...fields } = block;
  return Object.freeze({
    ...fields,
    get bytes(): Uint8Array {
      return bytes.slice();
    },
  });
}

/**
 * Accumulates decoded chunks during a single walk. {@link build} hands out a
 * frozen {@link WavDocument}; a failed walk simply drops the builder.
 */
export class DocumentBuilder {
  private readonly riffSize: number;
  private format: FormatDescriptor | null = null;
  private data: SampleBlock | null = null;
  private fact: FactInfo | null = null;
  private cue: CueTable | null = null;
  private readonly chunks: ChunkInfo[] = [];
  private readonly warnings: string[] = [];
  private consumed = false;

  constructor(riffSize: number) {
    this.riffSize = riffSize;
  }

  public get hasFormat(): boolean {
    return this.format !== null;
  }

  /** The descriptor a "data" chunk decoded right now would be tagged with. */
  public get currentFormat(): FormatDescriptor {
    return this.format ?? DEFAULT_FORMAT;
  }

  public get warningList(): readonly string[] {
    return this.warnings;
  }

  public addChunk(chunk: ChunkInfo): void {
    this.chunks.push(chunk);
  }

  public warn(message: string): void {
    this.warnings.push(message);
  }

  public setFormat(format: FormatDescriptor): void {
    this.format = format;
  }

  public setData(data: SampleBlock): void {
    this.data = data;
  }

  public setFact(fact: FactInfo): void {
    this.fact = fact;
  }

  public setCue(cue: CueTable): void {
    this.cue = cue;
  }

  /**
   * Freezes the accumulated state. Returns `null` when no "fmt " chunk was
   * recorded. A builder can only be built once.
   */
  public build(): WavDocument | null {
    if (this.consumed) throw new Error('DocumentBuilder has already been built');
    this.consumed = true;
    if (!this.format) return null;

    return Object.freeze({
      riffSize: this.riffSize,
      format: Object.freeze({ ...this.format }),
      data: this.data && freezeSampleBlock(this.data),
      fact: this.fact && Object.freeze({ ...this.fact }),
      cue:
        this.cue &&
        Object.freeze({
          ...this.cue,
          points: Object.freeze(this.cue.points.map((point) => Object.freeze({ ...point }))),
        }),
      chunks: Object.freeze(this.chunks.map((chunk) => Object.freeze({ ...chunk }))),
      warnings: Object.freeze([...this.warnings]),
    });
  }
}
