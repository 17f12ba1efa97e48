import { AUDIO_BANDS, type AudioLevels, type BandValues } from './types';
import { smoothValue } from './math';

/**
 * 正規化の定数
 */
const NORMALIZER = {
  INITIAL_PEAK: 1e-5,   // 0除算を避けるための初期ピーク
  SMOOTHING: 0.35,      // レベルのスムージング係数
  PEAK_DECAY: 0.999,    // ピークの減衰率（1ティックあたり）
};

function zeroBands(value: number): BandValues {
  return { volume: value, bass: value, mids: value, treble: value };
}

/**
 * 生値を正規化前に整える
 * 数値でない・有限でない・負の値は0として扱う
 */
export function sanitizeEnergy(raw: unknown): number {
  if (typeof raw !== 'number' || !Number.isFinite(raw) || raw < 0) {
    return 0;
  }
  return raw;
}

/**
 * AudioNormalizerクラス
 * 帯域ごとに減衰するピークを追跡し、生のエネルギーを0-1のレベルに自動ゲイン調整する
 */
export class AudioNormalizer {
  private peaks: BandValues = zeroBands(NORMALIZER.INITIAL_PEAK);
  private levels: BandValues = zeroBands(0);

  /**
   * 1ティック分の生値を取り込み、スムージング後のレベルを返す
   * @param raw 帯域ごとの生エネルギー（欠けた帯域は0として扱う）
   */
  public update(raw: Partial<Record<keyof BandValues, unknown>>): AudioLevels {
    for (const band of AUDIO_BANDS) {
      const value = sanitizeEnergy(raw[band]);

      this.peaks[band] = Math.max(this.peaks[band], value);
      const normalized = value / this.peaks[band];
      this.levels[band] = smoothValue(this.levels[band], normalized, NORMALIZER.SMOOTHING);
      this.peaks[band] *= NORMALIZER.PEAK_DECAY;
    }

    return this.getLevels();
  }

  /**
   * 現在のレベルを取得
   */
  public getLevels(): AudioLevels {
    return { ...this.levels };
  }

  /**
   * 現在のピークを取得（テスト・デバッグ用）
   */
  public getPeaks(): AudioLevels {
    return { ...this.peaks };
  }

  /**
   * 初期状態に戻す
   */
  public reset(): void {
    this.peaks = zeroBands(NORMALIZER.INITIAL_PEAK);
    this.levels = zeroBands(0);
  }
}
