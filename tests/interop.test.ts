import { describe, expect, it } from 'vitest';
import { WaveFile } from 'wavefile';
import { ID_DATA, parseWavBytes } from '../src';
import { expectDocument } from './utils/helpers';

describe('files written by wavefile', () => {
  it('reads 16-bit mono PCM', () => {
    const wav = new WaveFile();
    wav.fromScratch(1, 44100, '16', [0, 1, -1, 2]);
    const document = expectDocument(parseWavBytes(wav.toBuffer()));

    expect(document.format).toMatchObject({
      audioFormatCode: 1,
      channelCount: 1,
      sampleRate: 44100,
      byteRate: 88200,
      blockAlign: 2,
      bitsPerSample: 16,
    });
    expect(Array.from(document.data?.bytes ?? [])).toEqual([0, 0, 1, 0, 0xff, 0xff, 2, 0]);
  });

  it('reads interleaved 32-bit float stereo', () => {
    const wav = new WaveFile();
    wav.fromScratch(2, 48000, '32f', [
      [0.5, 0.25],
      [-0.5, -0.25],
    ]);
    const document = expectDocument(parseWavBytes(wav.toBuffer()));

    expect(document.format).toMatchObject({ audioFormatCode: 3, channelCount: 2, sampleRate: 48000, bitsPerSample: 32 });
    const data = document.data;
    expect(data?.declaredSize).toBe(16);
    if (data) {
      const view = new DataView(data.bytes.buffer, data.bytes.byteOffset, data.bytes.byteLength);
      expect([0, 4, 8, 12].map((at) => view.getFloat32(at, true))).toEqual([0.5, -0.5, 0.25, -0.25]);
    }
  });

  it('reads cue points and skips the label list', () => {
    const wav = new WaveFile();
    wav.fromScratch(1, 8000, '8', new Array<number>(8000).fill(128));
    wav.setCuePoint({ position: 500, label: 'loop start' });
    const document = expectDocument(parseWavBytes(wav.toBuffer()));

    expect(document.cue?.count).toBe(1);
    expect(document.cue?.points.map((p) => p.targetTag)).toEqual([ID_DATA]);
    expect(document.data?.declaredSize).toBe(8000);
  });
});
