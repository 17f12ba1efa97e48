import type { CanvasSurface, Color, Point } from './types';

function num(value: number): string {
  return String(Math.round(value * 100) / 100);
}

function rgb(color: Color): string {
  return `rgb(${color.r}, ${color.g}, ${color.b})`;
}

function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/**
 * 描画呼び出しをSVG要素として蓄積するサーフェス（ヘッドレス実行用）
 */
export class SvgSurface implements CanvasSurface {
  private readonly width: number;
  private readonly height: number;
  private elements: string[] = [];

  constructor(width: number, height: number) {
    this.width = width;
    this.height = height;
  }

  background(color: Color): void {
    // 背景は前のフレームの内容をすべて上書きする
    this.elements = [`<rect width="${this.width}" height="${this.height}" fill="${rgb(color)}"/>`];
  }

  line(from: Point, to: Point, width: number, color: Color): void {
    this.elements.push(
      `<line x1="${num(from.x)}" y1="${num(from.y)}" x2="${num(to.x)}" y2="${num(to.y)}" stroke="${rgb(color)}" stroke-width="${num(width)}" stroke-linecap="round"/>`
    );
  }

  polygon(points: readonly Point[], color: Color): void {
    const coords = points.map(point => `${num(point.x)},${num(point.y)}`).join(' ');
    this.elements.push(`<polygon points="${coords}" fill="${rgb(color)}"/>`);
  }

  circle(center: Point, radius: number, color: Color, alpha?: number): void {
    const opacity = alpha === undefined ? '' : ` fill-opacity="${num(alpha / 255)}"`;
    this.elements.push(`<circle cx="${num(center.x)}" cy="${num(center.y)}" r="${num(radius)}" fill="${rgb(color)}"${opacity}/>`);
  }

  text(content: string, at: Point, color: Color, size: number): void {
    this.elements.push(
      `<text x="${num(at.x)}" y="${num(at.y)}" fill="${rgb(color)}" font-size="${num(size)}" font-family="sans-serif" dominant-baseline="hanging">${escapeXml(content)}</text>`
    );
  }

  public get elementCount(): number {
    return this.elements.length;
  }

  /**
   * SVG文書として書き出す
   */
  public toSvg(): string {
    return [
      `<svg xmlns="http://www.w3.org/2000/svg" width="${this.width}" height="${this.height}" viewBox="0 0 ${this.width} ${this.height}">`,
      ...this.elements,
      '</svg>',
      ''
    ].join('\n');
  }
}
