import type { AudioLevels, CanvasSurface, Point, RenderSurface } from './types';
import { PALETTE } from './config';
import { OffsetSurface } from './OffsetSurface';
import { randomRange, type RandomSource } from './Random';

/**
 * 低音によるカメラシェイクの強さ（px）
 */
export const SHAKE_GAIN = 8;

/**
 * SceneCompositorクラス
 * 背景を塗り、シーンレイヤー（木とスパークル）だけを揺らして合成し、
 * 最後に揺れないオーバーレイを重ねる
 */
export class SceneCompositor {
  private readonly random: RandomSource;

  constructor(random: RandomSource) {
    this.random = random;
  }

  public getShakeMagnitude(levels: AudioLevels): number {
    return levels.bass * SHAKE_GAIN;
  }

  /**
   * このフレームのシェイク量を引く（x, yの順）
   */
  public nextOffset(levels: AudioLevels): Point {
    const shake = this.getShakeMagnitude(levels);
    return {
      x: randomRange(this.random, -1, 1) * shake,
      y: randomRange(this.random, -1, 1) * shake
    };
  }

  /**
   * 1フレームを合成
   * @param surface 描画先
   * @param levels 現在の音声レベル
   * @param drawScene シーンレイヤーの描画（ずらしたサーフェスを受け取る）
   * @param drawOverlay オーバーレイの描画（ずらさない）
   * @returns 使用したオフセット
   */
  public compose(
    surface: CanvasSurface,
    levels: AudioLevels,
    drawScene: (layer: RenderSurface) => void,
    drawOverlay?: (screen: CanvasSurface) => void
  ): Point {
    surface.background(PALETTE.BACKGROUND);

    const offset = this.nextOffset(levels);
    drawScene(new OffsetSurface(surface, offset));
    drawOverlay?.(surface);

    return offset;
  }
}
