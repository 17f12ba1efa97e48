import type { Color, Point, RenderSurface } from './types';

/**
 * すべての座標を一定量ずらして下位のサーフェスに描画する
 * カメラシェイクはシーンレイヤーだけにこれを挟んで適用する
 */
export class OffsetSurface implements RenderSurface {
  private readonly target: RenderSurface;
  private readonly offset: Point;

  constructor(target: RenderSurface, offset: Point) {
    this.target = target;
    this.offset = offset;
  }

  private shift(point: Point): Point {
    return { x: point.x + this.offset.x, y: point.y + this.offset.y };
  }

  line(from: Point, to: Point, width: number, color: Color): void {
    this.target.line(this.shift(from), this.shift(to), width, color);
  }

  polygon(points: readonly Point[], color: Color): void {
    this.target.polygon(points.map(point => this.shift(point)), color);
  }

  circle(center: Point, radius: number, color: Color, alpha?: number): void {
    this.target.circle(this.shift(center), radius, color, alpha);
  }
}
