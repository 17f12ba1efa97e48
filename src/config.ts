import type { AudioBand, Color } from './types';

/**
 * 画面とフレームループの設定
 */
export const VIEWPORT = {
  WIDTH: 1920,
  HEIGHT: 1080,
  FPS: 60,
};

/**
 * 音声解析の設定
 */
export const AUDIO = {
  SAMPLE_RATE: 44100,
  CHUNK_SIZE: 2048,
  // 16bit PCM相当のスケール（Web Audioの-1〜1をこの範囲に合わせる）
  SAMPLE_SCALE: 32768,
};

/**
 * 帯域ごとの周波数範囲（Hz、下限を含み上限を含まない）
 */
export const FREQUENCY_BANDS: Record<Exclude<AudioBand, 'volume'>, readonly [number, number]> = {
  bass: [20, 250],
  mids: [250, 2000],
  treble: [2000, 8000],
};

/**
 * 配色
 */
export const PALETTE = {
  BACKGROUND: { r: 15, g: 10, b: 20 },
  BRANCH: { r: 80, g: 60, b: 40 },
  // 水彩風の青い花
  FLOWER_MID: { r: 100, g: 130, b: 220 },
  FLOWER_HIGH: { r: 200, g: 220, b: 255 },
  FLOWER_CENTER: { r: 255, g: 255, b: 200 },
  // くすんだ緑の葉
  LEAF_START: { r: 40, g: 60, b: 45 },
  LEAF_END: { r: 90, g: 130, b: 95 },
  SPARKLE: { r: 240, g: 245, b: 255 },
  OVERLAY_TEXT: { r: 200, g: 200, b: 200 },
  OVERLAY_TRACK: { r: 60, g: 60, b: 60 },
  OVERLAY_BAR: { r: 150, g: 255, b: 150 },
} satisfies Record<string, Color>;
