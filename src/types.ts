/**
 * 2D座標を表すインターフェース（画面座標系、y軸は下向き）
 */
export interface Point {
  x: number;
  y: number;
}

/**
 * RGB色（各チャンネル0-255）
 */
export interface Color {
  r: number;
  g: number;
  b: number;
}

/**
 * 解析対象の帯域名
 */
export type AudioBand = 'volume' | 'bass' | 'mids' | 'treble';

/**
 * 帯域ごとのスカラー値
 */
export type BandValues = Record<AudioBand, number>;

/**
 * オーディオプロバイダーが返す生のエネルギー値（非負、スケールは任意）
 */
export type RawAudioLevels = BandValues;

/**
 * 正規化・スムージング後のレベル（各値0-1）
 */
export type AudioLevels = Readonly<BandValues>;

/**
 * 帯域名の一覧（処理順）
 */
export const AUDIO_BANDS: readonly AudioBand[] = ['volume', 'bass', 'mids', 'treble'];

/**
 * アリーナ内の枝・葉・花を指すハンドル
 */
export type BranchId = number;
export type LeafId = number;
export type FlowerId = number;

/**
 * 描画先サーフェス
 * コアはこの3種類の描画呼び出しだけを毎フレーム発行する
 */
export interface RenderSurface {
  line(from: Point, to: Point, width: number, color: Color): void;
  polygon(points: readonly Point[], color: Color): void;
  circle(center: Point, radius: number, color: Color, alpha?: number): void;
}

/**
 * フレーム全体を扱うサーフェス（背景塗りとオーバーレイ用テキストを追加）
 */
export interface CanvasSurface extends RenderSurface {
  background(color: Color): void;
  text(content: string, at: Point, color: Color, size: number): void;
}

/**
 * オーディオ入力のインターフェース
 */
export interface AudioProvider {
  readonly name: string;
  initialize(): Promise<void>;
  readFrame(): RawAudioLevels;
  dispose(): void;
}
