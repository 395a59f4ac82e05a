import type { FormatDescriptor, WavDocument } from '../types';
import { WAVE_FORMAT_IEEE_FLOAT, WAVE_FORMAT_PCM } from '../constants';

/**
 * A constant mapping of the format codes this reader accepts to their human-readable names.
 */
export const AUDIO_FORMAT_NAMES = {
  [WAVE_FORMAT_PCM]: 'PCM',
  [WAVE_FORMAT_IEEE_FLOAT]: 'IEEE Float',
} as const;

export const SUPPORTED_AUDIO_FORMATS: ReadonlySet<number> = new Set([WAVE_FORMAT_PCM, WAVE_FORMAT_IEEE_FLOAT]);

/**
 * Descriptor in effect before any "fmt " chunk has been decoded.
 */
export const DEFAULT_FORMAT: FormatDescriptor = Object.freeze({
  declaredSize: 0,
  audioFormatCode: WAVE_FORMAT_PCM,
  channelCount: 0,
  sampleRate: 0,
  byteRate: 0,
  blockAlign: 0,
  bitsPerSample: 0,
});

export function isSupportedAudioFormat(code: number): boolean {
  return SUPPORTED_AUDIO_FORMATS.has(code);
}

export function formatCodeHex(code: number): string {
  return `0x${code.toString(16).padStart(4, '0')}`;
}

export function describeAudioFormat(code: number): string {
  if (code === WAVE_FORMAT_PCM || code === WAVE_FORMAT_IEEE_FLOAT) {
    return AUDIO_FORMAT_NAMES[code];
  }
  return `Unknown (${formatCodeHex(code)})`;
}

/**
 * Cross-checks the fields of a format descriptor. The findings are advisory;
 * the reader reports them as warnings and keeps going.
 */
export function checkFormatConsistency(format: FormatDescriptor): string[] {
  const findings: string[] = [];

  if (format.channelCount === 0) findings.push('Invalid format: 0 channels');
  if (format.sampleRate === 0) findings.push('Invalid format: 0 Hz sample rate');
  if (format.bitsPerSample === 0) {
    findings.push('Invalid format: 0 bits per sample');
  } else if (format.channelCount > 0) {
    const expectedBlockAlign = format.channelCount * Math.ceil(format.bitsPerSample / 8);
    if (format.blockAlign !== expectedBlockAlign) {
      findings.push(`Invalid format: block align mismatch (${format.blockAlign} vs ${expectedBlockAlign})`);
    }
  }

  const expectedByteRate = format.sampleRate * format.blockAlign;
  if (format.byteRate !== expectedByteRate) {
    findings.push(`Invalid format: byte rate mismatch (${format.byteRate} vs ${expectedByteRate})`);
  }

  return findings;
}

/**
 * Number of whole frames in the document's sample block.
 */
export function frameCount(document: WavDocument): number {
  const { data, format } = document;
  if (!data || format.blockAlign <= 0) return 0;
  return Math.floor(data.declaredSize / format.blockAlign);
}

export function durationSeconds(document: WavDocument): number {
  const { sampleRate } = document.format;
  return sampleRate > 0 ? frameCount(document) / sampleRate : 0;
}
