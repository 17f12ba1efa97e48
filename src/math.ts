import type { Color, Point } from './types';

/**
 * 値を[min, max]に制限
 */
export function constrain(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * 目標値へ指数的に近づける（1ティック分）
 * @param current 現在値
 * @param target 目標値
 * @param factor スムージング係数（0-1）
 */
export function smoothValue(current: number, target: number, factor: number): number {
  return current + (target - current) * factor;
}

export function degToRad(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

export function radToDeg(radians: number): number {
  return (radians * 180) / Math.PI;
}

/**
 * 角度（度）方向の単位ベクトル
 */
export function direction(degrees: number): Point {
  const rad = degToRad(degrees);
  return { x: Math.cos(rad), y: Math.sin(rad) };
}

export function addScaled(origin: Point, dir: Point, length: number): Point {
  return { x: origin.x + dir.x * length, y: origin.y + dir.y * length };
}

export function lerpPoint(p1: Point, p2: Point, t: number): Point {
  return {
    x: p1.x + (p2.x - p1.x) * t,
    y: p1.y + (p2.y - p1.y) * t,
  };
}

/**
 * 2色を線形補間（チャンネルは整数に切り捨て）
 */
export function lerpColor(from: Color, to: Color, t: number): Color {
  return {
    r: Math.floor((1 - t) * from.r + t * to.r),
    g: Math.floor((1 - t) * from.g + t * to.g),
    b: Math.floor((1 - t) * from.b + t * to.b),
  };
}

export function scaleColor(color: Color, factor: number): Color {
  return {
    r: Math.floor(color.r * factor),
    g: Math.floor(color.g * factor),
    b: Math.floor(color.b * factor),
  };
}
