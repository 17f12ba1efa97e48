import type p5 from 'p5';
import type { CanvasSurface, Color, Point } from './types';

/**
 * P5Surfaceが使うp5の機能（p5インスタンスとp5.Graphicsのどちらでもよい）
 */
export type P5Canvas = Pick<
  p5,
  | 'push' | 'pop' | 'background' | 'stroke' | 'strokeWeight' | 'noStroke' | 'fill'
  | 'line' | 'circle' | 'beginShape' | 'vertex' | 'endShape' | 'text' | 'textSize' | 'textAlign'
  | 'CLOSE' | 'LEFT' | 'TOP'
>;

/**
 * p5への描画サーフェス
 */
export class P5Surface implements CanvasSurface {
  private readonly p: P5Canvas;

  constructor(p: P5Canvas) {
    this.p = p;
  }

  background(color: Color): void {
    this.p.background(color.r, color.g, color.b);
  }

  line(from: Point, to: Point, width: number, color: Color): void {
    this.p.push();
    this.p.stroke(color.r, color.g, color.b);
    this.p.strokeWeight(width);
    this.p.line(from.x, from.y, to.x, to.y);
    this.p.pop();
  }

  polygon(points: readonly Point[], color: Color): void {
    if (points.length < 3) return;

    this.p.push();
    this.p.noStroke();
    this.p.fill(color.r, color.g, color.b);
    this.p.beginShape();
    for (const point of points) {
      this.p.vertex(point.x, point.y);
    }
    this.p.endShape(this.p.CLOSE);
    this.p.pop();
  }

  circle(center: Point, radius: number, color: Color, alpha: number = 255): void {
    this.p.push();
    this.p.noStroke();
    this.p.fill(color.r, color.g, color.b, alpha);
    // p5のcircleは直径を取る
    this.p.circle(center.x, center.y, radius * 2);
    this.p.pop();
  }

  text(content: string, at: Point, color: Color, size: number): void {
    this.p.push();
    this.p.noStroke();
    this.p.fill(color.r, color.g, color.b);
    this.p.textSize(size);
    this.p.textAlign(this.p.LEFT, this.p.TOP);
    this.p.text(content, at.x, at.y);
    this.p.pop();
  }
}
