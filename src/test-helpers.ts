import type { CanvasSurface, Color, Point } from './types';
import type { RandomSource } from './Random';

export type DrawCall =
  | { type: 'background'; color: Color }
  | { type: 'line'; from: Point; to: Point; width: number; color: Color }
  | { type: 'polygon'; points: Point[]; color: Color }
  | { type: 'circle'; center: Point; radius: number; color: Color; alpha?: number }
  | { type: 'text'; content: string; at: Point; color: Color; size: number };

/**
 * 描画呼び出しを順番どおりに記録するサーフェス（テスト用）
 */
export class RecordingSurface implements CanvasSurface {
  public readonly calls: DrawCall[] = [];

  background(color: Color): void {
    this.calls.push({ type: 'background', color });
  }

  line(from: Point, to: Point, width: number, color: Color): void {
    this.calls.push({ type: 'line', from: { ...from }, to: { ...to }, width, color });
  }

  polygon(points: readonly Point[], color: Color): void {
    this.calls.push({ type: 'polygon', points: points.map(point => ({ ...point })), color });
  }

  circle(center: Point, radius: number, color: Color, alpha?: number): void {
    this.calls.push({ type: 'circle', center: { ...center }, radius, color, alpha });
  }

  text(content: string, at: Point, color: Color, size: number): void {
    this.calls.push({ type: 'text', content, at: { ...at }, color, size });
  }

  public ofType<T extends DrawCall['type']>(type: T): Extract<DrawCall, { type: T }>[] {
    const matches: Extract<DrawCall, { type: T }>[] = [];
    for (const call of this.calls) {
      if (isCallOf(call, type)) {
        matches.push(call);
      }
    }
    return matches;
  }
}

function isCallOf<T extends DrawCall['type']>(call: DrawCall, type: T): call is Extract<DrawCall, { type: T }> {
  return call.type === type;
}

/**
 * 決められた値を順番に返す乱数源（末尾まで来たら先頭に戻る）
 */
export class SequenceRandom implements RandomSource {
  private readonly values: readonly number[];
  private index = 0;
  public draws = 0;

  constructor(values: readonly number[]) {
    if (values.length === 0) {
      throw new Error('SequenceRandomには1つ以上の値が必要です');
    }
    this.values = values;
  }

  next(): number {
    const value = this.values[this.index];
    this.index = (this.index + 1) % this.values.length;
    this.draws++;
    return value;
  }
}

export function levelsOf(value: number): { volume: number; bass: number; mids: number; treble: number } {
  return { volume: value, bass: value, mids: value, treble: value };
}
