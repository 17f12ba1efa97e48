import type { Point, RenderSurface } from './types';
import { PALETTE, VIEWPORT } from './config';
import { randomRange, type RandomSource } from './Random';

/**
 * スパークル（開花時に放出される短命のパーティクル）
 */
export interface Sparkle {
  x: number;
  y: number;
  vx: number;               // x方向速度（px/ティック）
  vy: number;               // y方向速度（px/ティック）
  life: number;             // 残り寿命（秒）
  maxLife: number;          // 生成時の寿命（秒）
  size: number;             // 半径の基準値
}

const SPARKLE = {
  MIN_SPEED: 0.8,
  MAX_SPEED: 2.5,
  MIN_LIFE: 0.6,
  MAX_LIFE: 1.2,
  MIN_SIZE: 1,
  MAX_SIZE: 3,
  DRAG: 0.93,               // 速度の減衰（1ティックあたり）
};

/**
 * SparkleSystemクラス
 * 花から放出されたスパークルを保持し、移動・減衰・削除を行う
 */
export class SparkleSystem {
  private sparkles: Sparkle[] = [];
  private readonly random: RandomSource;
  private readonly tickRate: number;

  constructor(random: RandomSource, tickRate: number = VIEWPORT.FPS) {
    this.random = random;
    this.tickRate = tickRate;
  }

  /**
   * 指定位置からスパークルを放出
   * @param position 放出位置
   * @param count 放出数
   */
  public emit(position: Point, count: number): void {
    for (let i = 0; i < count; i++) {
      const angle = randomRange(this.random, 0, Math.PI * 2);
      const speed = randomRange(this.random, SPARKLE.MIN_SPEED, SPARKLE.MAX_SPEED);
      const life = randomRange(this.random, SPARKLE.MIN_LIFE, SPARKLE.MAX_LIFE);
      const size = randomRange(this.random, SPARKLE.MIN_SIZE, SPARKLE.MAX_SIZE);

      this.sparkles.push({
        x: position.x,
        y: position.y,
        vx: Math.cos(angle) * speed,
        vy: Math.sin(angle) * speed,
        life,
        maxLife: life,
        size
      });
    }
  }

  /**
   * 1ティック分更新し、寿命が尽きたものを取り除く
   */
  public update(): void {
    for (const sparkle of this.sparkles) {
      sparkle.x += sparkle.vx;
      sparkle.y += sparkle.vy;
      sparkle.vx *= SPARKLE.DRAG;
      sparkle.vy *= SPARKLE.DRAG;
      sparkle.life -= 1 / this.tickRate;
    }

    this.sparkles = this.sparkles.filter(sparkle => sparkle.life > 0);
  }

  /**
   * スパークルを描画（大きさと不透明度は残り寿命に比例）
   */
  public draw(surface: RenderSurface): void {
    for (const sparkle of this.sparkles) {
      if (sparkle.life <= 0) continue;

      const ratio = sparkle.life / sparkle.maxLife;
      surface.circle(
        { x: sparkle.x, y: sparkle.y },
        sparkle.size * ratio,
        PALETTE.SPARKLE,
        Math.floor(255 * ratio)
      );
    }
  }

  public getSparkles(): readonly Sparkle[] {
    return this.sparkles;
  }

  public get count(): number {
    return this.sparkles.length;
  }

  public clear(): void {
    this.sparkles = [];
  }
}
