import { readFile } from 'node:fs/promises';
import type { AudioProvider, RawAudioLevels } from './types';
import { AUDIO } from './config';
import { computeBandEnergies } from './Spectrum';

/**
 * 生のPCMファイル（符号付き16bitリトルエンディアン、モノラル）を読むプロバイダー
 * フレームは固定長で、末尾の短いフレームは0で埋める。最後まで読んだら先頭に戻る
 */
export class PcmFileSource implements AudioProvider {
  public readonly name: string;
  private readonly path: string;
  private readonly sampleRate: number;
  private readonly frameSize: number;
  private samples: Int16Array | null = null;
  private cursor: number = 0;

  constructor(path: string, options: { sampleRate?: number; frameSize?: number } = {}) {
    this.path = path;
    this.name = `pcm:${path}`;
    this.sampleRate = options.sampleRate ?? AUDIO.SAMPLE_RATE;
    this.frameSize = options.frameSize ?? AUDIO.CHUNK_SIZE;
  }

  async initialize(): Promise<void> {
    const buffer = await readFile(this.path);
    if (buffer.length === 0) {
      throw new Error(`PCMファイルが空です: ${this.path}`);
    }
    if (buffer.length % 2 !== 0) {
      throw new Error(`PCMファイルのバイト数が奇数です: ${this.path}`);
    }

    const samples = new Int16Array(buffer.length / 2);
    for (let i = 0; i < samples.length; i++) {
      samples[i] = buffer.readInt16LE(i * 2);
    }

    this.samples = samples;
    this.cursor = 0;
    console.log(`[PcmFileSource] 読み込み完了: ${this.path} (${samples.length} samples)`);
  }

  readFrame(): RawAudioLevels {
    if (!this.samples) {
      throw new Error('PcmFileSourceが初期化されていません');
    }

    const frame = new Float64Array(this.frameSize);
    const available = Math.min(this.frameSize, this.samples.length - this.cursor);
    for (let i = 0; i < available; i++) {
      frame[i] = this.samples[this.cursor + i];
    }

    this.cursor += this.frameSize;
    if (this.cursor >= this.samples.length) {
      this.cursor = 0;
    }

    return computeBandEnergies(frame, this.sampleRate);
  }

  dispose(): void {
    this.samples = null;
    this.cursor = 0;
  }
}
