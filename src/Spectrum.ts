import type { RawAudioLevels } from './types';
import { AUDIO, FREQUENCY_BANDS } from './config';

/**
 * 実数列のFFT振幅（0〜N/2のビン）を計算
 * 長さは2のべき乗であること
 */
export function magnitudeSpectrum(samples: ArrayLike<number>): Float64Array {
  const n = samples.length;
  if (n === 0 || (n & (n - 1)) !== 0) {
    throw new Error(`フレーム長が2のべき乗ではありません: ${n}`);
  }

  const re = new Float64Array(n);
  const im = new Float64Array(n);

  // ビット反転順に並べ替え
  for (let i = 0, j = 0; i < n; i++) {
    re[j] = samples[i];
    let bit = n >> 1;
    while (bit > 0 && (j & bit) !== 0) {
      j ^= bit;
      bit >>= 1;
    }
    j |= bit;
  }

  // バタフライ演算
  for (let size = 2; size <= n; size <<= 1) {
    const half = size >> 1;
    const step = (-2 * Math.PI) / size;
    for (let start = 0; start < n; start += size) {
      for (let k = 0; k < half; k++) {
        const wr = Math.cos(step * k);
        const wi = Math.sin(step * k);
        const a = start + k;
        const b = a + half;
        const tr = re[b] * wr - im[b] * wi;
        const ti = re[b] * wi + im[b] * wr;
        re[b] = re[a] - tr;
        im[b] = im[a] - ti;
        re[a] += tr;
        im[a] += ti;
      }
    }
  }

  const magnitudes = new Float64Array(n / 2 + 1);
  for (let k = 0; k < magnitudes.length; k++) {
    magnitudes[k] = Math.hypot(re[k], im[k]);
  }
  return magnitudes;
}

/**
 * 周波数範囲[low, high)に入るビンの平均振幅（該当ビンがなければ0）
 */
function bandMean(magnitudes: Float64Array, binWidth: number, low: number, high: number): number {
  let sum = 0;
  let count = 0;
  for (let k = 0; k < magnitudes.length; k++) {
    const frequency = k * binWidth;
    if (frequency >= low && frequency < high) {
      sum += magnitudes[k];
      count++;
    }
  }
  return count > 0 ? sum / count : 0;
}

/**
 * 1フレーム分のサンプル（16bit PCMスケール）から帯域エネルギーを計算
 * volumeはRMS、bass/mids/trebleは各帯域の平均振幅
 * @param samples サンプル列（長さは2のべき乗）
 * @param sampleRate サンプリングレート（Hz）
 */
export function computeBandEnergies(samples: ArrayLike<number>, sampleRate: number = AUDIO.SAMPLE_RATE): RawAudioLevels {
  let sumSquares = 0;
  let silent = true;
  for (let i = 0; i < samples.length; i++) {
    sumSquares += samples[i] * samples[i];
    if (samples[i] !== 0) silent = false;
  }

  if (samples.length > 0 && silent) {
    return { volume: 0, bass: 0, mids: 0, treble: 0 };
  }

  const magnitudes = magnitudeSpectrum(samples);
  const binWidth = sampleRate / samples.length;

  return {
    volume: Math.sqrt(sumSquares / samples.length),
    bass: bandMean(magnitudes, binWidth, ...FREQUENCY_BANDS.bass),
    mids: bandMean(magnitudes, binWidth, ...FREQUENCY_BANDS.mids),
    treble: bandMean(magnitudes, binWidth, ...FREQUENCY_BANDS.treble)
  };
}
