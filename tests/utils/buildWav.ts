export interface ChunkSpec {
  /** Four characters, or four raw bytes for tags that are not printable. */
  id: string | Uint8Array;
  /** Declared size; defaults to the payload length. */
  size?: number;
  data?: Uint8Array;
  /** Append a pad byte after an odd payload. On by default when the payload is complete. */
  pad?: boolean;
}

export interface WavLayout {
  riffSize?: number;
  chunks: ChunkSpec[];
  /** Trailing bytes appended after the last chunk. */
  trailer?: Uint8Array;
}

function tagBytes(id: string | Uint8Array): Uint8Array {
  if (typeof id !== 'string') return id;
  const out = new Uint8Array(4);
  for (let i = 0; i < 4; i++) out[i] = id.charCodeAt(i);
  return out;
}

/**
 * Assembles a RIFF/WAVE byte layout from chunk specs. Nothing is validated,
 * so broken files are as easy to build as good ones.
 */
export function buildWav(layout: WavLayout): Uint8Array {
  const parts: Uint8Array[] = [];
  for (const chunk of layout.chunks) {
    const data = chunk.data ?? new Uint8Array(0);
    const size = chunk.size ?? data.length;
    const pad = chunk.pad ?? (data.length === size && (size & 1) === 1);
    const bytes = new Uint8Array(8 + data.length + (pad ? 1 : 0));
    bytes.set(tagBytes(chunk.id), 0);
    new DataView(bytes.buffer).setUint32(4, size, true);
    bytes.set(data, 8);
    parts.push(bytes);
  }
  if (layout.trailer) parts.push(layout.trailer);

  const bodyLength = parts.reduce((n, p) => n + p.length, 0);
  const buffer = new Uint8Array(12 + bodyLength);
  const view = new DataView(buffer.buffer);
  buffer.set(tagBytes('RIFF'), 0);
  view.setUint32(4, layout.riffSize ?? buffer.length - 8, true);
  buffer.set(tagBytes('WAVE'), 8);

  let offset = 12;
  for (const part of parts) {
    buffer.set(part, offset);
    offset += part.length;
  }
  return buffer;
}

export interface FmtFields {
  audioFormat?: number;
  channels?: number;
  sampleRate?: number;
  byteRate?: number;
  blockAlign?: number;
  bitsPerSample?: number;
  /** Extension bytes appended after the 16 fixed bytes. */
  extension?: Uint8Array;
}

/** "fmt " payload; defaults describe 8-bit mono PCM at 44.1 kHz. */
export function fmtBody(fields: FmtFields = {}): Uint8Array {
  const extension = fields.extension ?? new Uint8Array(0);
  const out = new Uint8Array(16 + extension.length);
  const view = new DataView(out.buffer);
  view.setUint16(0, fields.audioFormat ?? 1, true);
  view.setUint16(2, fields.channels ?? 1, true);
  view.setUint32(4, fields.sampleRate ?? 44100, true);
  view.setUint32(8, fields.byteRate ?? 44100, true);
  view.setUint16(12, fields.blockAlign ?? 1, true);
  view.setUint16(14, fields.bitsPerSample ?? 8, true);
  out.set(extension, 16);
  return out;
}

export interface CueRecord {
  identifier: number;
  position: number;
  target?: string;
  chunkStart?: number;
  blockStart?: number;
  sampleOffset: number;
}

/** "cue " payload; `count` defaults to the number of records. */
export function cueBody(records: CueRecord[], count = records.length): Uint8Array {
  const out = new Uint8Array(4 + records.length * 24);
  const view = new DataView(out.buffer);
  view.setUint32(0, count, true);
  records.forEach((record, i) => {
    const at = 4 + i * 24;
    view.setUint32(at, record.identifier, true);
    view.setUint32(at + 4, record.position, true);
    out.set(tagBytes(record.target ?? 'data'), at + 8);
    view.setUint32(at + 12, record.chunkStart ?? 0, true);
    view.setUint32(at + 16, record.blockStart ?? 0, true);
    view.setUint32(at + 20, record.sampleOffset, true);
  });
  return out;
}

export function u32(value: number): Uint8Array {
  const out = new Uint8Array(4);
  new DataView(out.buffer).setUint32(0, value, true);
  return out;
}

export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  const out = new Uint8Array(parts.reduce((n, p) => n + p.length, 0));
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

export function ascii(text: string): Uint8Array {
  return Uint8Array.from(text, (c) => c.charCodeAt(0));
}
