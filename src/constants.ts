/**
 * The format tag for standard pulse-code modulation (PCM) audio.
 * @type {0x0001}
 * @constant
 */
export const WAVE_FORMAT_PCM: 0x0001 = 0x0001;

/**
 * The format tag for IEEE 754 floating-point audio data.
 * @type {0x0003}
 * @constant
 */
export const WAVE_FORMAT_IEEE_FLOAT: 0x0003 = 0x0003;

/**
 * The FourCC for a standard RIFF (Resource Interchange File Format) container.
 * @type {0x52494646}
 * @constant
 */
export const ID_RIFF: 0x52494646 = 0x52494646;

/**
 * The FourCC at byte 8 of a RIFF container that holds WAVE audio.
 * @type {0x57415645}
 * @constant
 */
export const ID_WAVE: 0x57415645 = 0x57415645;

/**
 * The FourCC for a "fmt " chunk, which contains the format information of the audio data.
 * @type {0x666d7420}
 * @constant
 */
export const ID_FMT: 0x666d7420 = 0x666d7420;

/**
 * The FourCC for a "data" chunk, which contains the raw audio sample data.
 * @type {0x64617461}
 * @constant
 */
export const ID_DATA: 0x64617461 = 0x64617461;

/**
 * The FourCC for a "fact" chunk, which stores the number of samples per channel.
 * @type {0x66616374}
 * @constant
 */
export const ID_FACT: 0x66616374 = 0x66616374;

/**
 * The FourCC for a "cue " chunk, which lists sample-accurate markers into the data chunk.
 * @type {0x63756520}
 * @constant
 */
export const ID_CUE: 0x63756520 = 0x63756520;

export const ID_JUNK: 0x4a554e4b = 0x4a554e4b;
export const ID_LIST: 0x4c495354 = 0x4c495354;
export const ID_INFO: 0x494e464f = 0x494e464f;
export const ID_SMPL: 0x736d706c = 0x736d706c;
export const ID_INST: 0x696e7374 = 0x696e7374;
export const ID_BEXT: 0x62657874 = 0x62657874;
export const ID_IXML: 0x69584d4c = 0x69584d4c;

/**
 * Chunks that are common in the wild but carry nothing the reader decodes.
 * They take the same path as any unknown chunk.
 */
export const INERT_CHUNK_IDS: ReadonlySet<number> = new Set([
  ID_JUNK,
  ID_LIST,
  ID_INFO,
  ID_SMPL,
  ID_INST,
  ID_BEXT,
  ID_IXML,
]);

/** "RIFF" + size + "WAVE" */
export const RIFF_HEADER_SIZE = 12 as const;

export const CHUNK_TAG_SIZE = 4 as const;

/** Fixed part of a "fmt " payload; anything beyond is a format extension. */
export const FMT_CHUNK_MIN_SIZE = 16 as const;

export const CUE_POINT_SIZE = 24 as const;
