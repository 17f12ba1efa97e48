import type { AudioProvider, RawAudioLevels } from './types';
import { AUDIO } from './config';
import { computeBandEnergies } from './Spectrum';

declare global {
  interface Window {
    webkitAudioContext?: typeof AudioContext;
  }
}

export interface AudioAnalyzerOptions {
  /** マイクのトラックが外部から停止された時に呼ばれる */
  onDeviceLost?: () => void;
}

/**
 * AudioAnalyzer - マイク入力から帯域エネルギーをリアルタイムで解析
 */
export class AudioAnalyzer implements AudioProvider {
  public readonly name = 'microphone';
  private audioContext: AudioContext | null = null;
  private analyserNode: AnalyserNode | null = null;
  private microphone: MediaStreamAudioSourceNode | null = null;
  private mediaStream: MediaStream | null = null;
  private samples = new Float32Array(0);
  private active: boolean = false;
  private readonly onDeviceLost?: () => void;

  constructor(options: AudioAnalyzerOptions = {}) {
    this.onDeviceLost = options.onDeviceLost;
  }

  /**
   * AudioAnalyzerを初期化し、マイクアクセスを取得
   */
  async initialize(): Promise<void> {
    try {
      console.log('[AudioAnalyzer] 初期化開始...');

      // 再初期化の場合は既存のリソースを解放
      if (this.active) {
        console.log('[AudioAnalyzer] 既存のリソースをクリーンアップ中...');
        this.dispose();
      }

      const AudioContextClass: typeof AudioContext | undefined = window.AudioContext ?? window.webkitAudioContext;
      if (!AudioContextClass) {
        throw new Error('Web Audio APIがサポートされていません');
      }

      this.audioContext = new AudioContextClass();

      console.log('[AudioAnalyzer] マイクアクセス要求中...');
      this.mediaStream = await navigator.mediaDevices.getUserMedia({
        audio: {
          echoCancellation: false,
          noiseSuppression: false,
          autoGainControl: false
        }
      });
      console.log('[AudioAnalyzer] マイクアクセス許可されました');

      const [track] = this.mediaStream.getAudioTracks();
      if (track) {
        console.log('[AudioAnalyzer] 使用中のマイク:', track.label);
        track.addEventListener('ended', () => {
          console.warn('[AudioAnalyzer] マイクトラックが停止されました');
          this.active = false;
          this.onDeviceLost?.();
        });
      }

      // 解析は自前のFFTで行うので、AnalyserNodeは時間領域データの取得だけに使う
      this.analyserNode = this.audioContext.createAnalyser();
      this.analyserNode.fftSize = AUDIO.CHUNK_SIZE;
      this.analyserNode.smoothingTimeConstant = 0;

      this.microphone = this.audioContext.createMediaStreamSource(this.mediaStream);
      this.microphone.connect(this.analyserNode);

      if (this.audioContext.state === 'suspended') {
        console.log('[AudioAnalyzer] AudioContextを再開中...');
        await this.audioContext.resume();
      }

      this.samples = new Float32Array(this.analyserNode.fftSize);
      this.active = true;
      console.log('[AudioAnalyzer] 初期化完了 - sampleRate:', this.audioContext.sampleRate);
    } catch (error) {
      console.error('[AudioAnalyzer] 初期化エラー:', error);
      if (error instanceof Error) {
        if (error.name === 'NotAllowedError') {
          throw new Error('マイクアクセスが拒否されました');
        } else if (error.name === 'NotFoundError') {
          throw new Error('マイクが見つかりません');
        }
      }
      throw error;
    }
  }

  /**
   * 現在のフレームの帯域エネルギーを取得
   * アクティブでない場合は例外を投げる（呼び出し側で無音フレームに置き換える）
   */
  readFrame(): RawAudioLevels {
    if (!this.analyserNode || !this.audioContext || !this.active) {
      throw new Error('AudioAnalyzerがアクティブではありません');
    }

    if (this.audioContext.state === 'suspended') {
      console.warn('[AudioAnalyzer] AudioContext is suspended, attempting to resume...');
      this.audioContext.resume().catch(error => {
        console.warn('[AudioAnalyzer] AudioContext再開エラー:', error);
      });
      return { volume: 0, bass: 0, mids: 0, treble: 0 };
    }

    this.analyserNode.getFloatTimeDomainData(this.samples);

    // -1〜1 を16bit PCMのスケールに合わせる
    const scaled = new Float64Array(this.samples.length);
    for (let i = 0; i < this.samples.length; i++) {
      scaled[i] = this.samples[i] * AUDIO.SAMPLE_SCALE;
    }

    return computeBandEnergies(scaled, this.audioContext.sampleRate);
  }

  /**
   * AudioAnalyzerがアクティブかどうかを返す
   */
  isActive(): boolean {
    return this.active;
  }

  /**
   * リソースを解放
   */
  dispose(): void {
    this.active = false;

    if (this.mediaStream) {
      for (const track of this.mediaStream.getTracks()) {
        track.stop();
      }
      this.mediaStream = null;
    }

    if (this.microphone) {
      try {
        this.microphone.disconnect();
      } catch (e) {
        console.warn('[AudioAnalyzer] マイクノード切断エラー:', e);
      }
      this.microphone = null;
    }

    if (this.analyserNode) {
      try {
        this.analyserNode.disconnect();
      } catch (e) {
        console.warn('[AudioAnalyzer] アナライザーノード切断エラー:', e);
      }
      this.analyserNode = null;
    }

    if (this.audioContext) {
      if (this.audioContext.state !== 'closed') {
        this.audioContext.close().catch((e) => {
          console.warn('[AudioAnalyzer] AudioContextクローズエラー:', e);
        });
      }
      this.audioContext = null;
    }

    this.samples = new Float32Array(0);
    console.log('[AudioAnalyzer] リソース解放完了');
  }
}
