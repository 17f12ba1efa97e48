import type { BranchId, RenderSurface } from './types';
import type { Branch } from './Branch';
import type { Foliage, FoliageContext } from './Foliage';
import { PALETTE } from './config';
import { addScaled, constrain, direction, smoothValue } from './math';
import { randomInt, randomRange, type RandomSource } from './Random';
import type { SparkleSystem } from './SparkleSystem';

/**
 * 花の開花パラメータ
 */
export const FLOWER_BLOOM = {
  BRANCH_THRESHOLD: 0.7,    // 成熟した枝でのみ開花
  TREBLE_GAIN: 1.5,
  RATE: 0.1,                // 開く速さ・閉じる速さ
  EMIT_THRESHOLD: 0.5,      // これを超えて上昇した時だけ放出
  EMIT_MIN_RISE: 0.05,      // 前ティックからの上昇幅の下限
  MIN_SPARKLES: 1,
  MAX_SPARKLES: 3,
  ROTATION_GAIN: 20,        // 高音による回転（度/ティック）
  DRAW_THRESHOLD: 0.05,
  HIGHLIGHT_THRESHOLD: 0.3,
  PETAL_ALPHA: 150,
  HIGHLIGHT_ALPHA: 100,
  HIGHLIGHT_NUDGE: 10,      // ハイライトの角度ずらし（度）
};

export interface FlowerOptions {
  position: number;         // 枝上の相対位置（0-1）
  size: number;
  rotation: number;         // 度
  petalCount: number;
}

/**
 * Flowerクラス
 * 高音で開く水彩風の花。開花が立ち上がった瞬間にスパークルを放出する
 */
export class Flower implements Foliage {
  public readonly branchId: BranchId;
  public readonly position: number;
  public readonly size: number;
  public readonly petalCount: number;
  public rotation: number;
  public bloom: number = 0;       // 開花度（0-1）
  public lastBloom: number = 0;   // 前ティックの開花度

  constructor(branchId: BranchId, options: FlowerOptions) {
    this.branchId = branchId;
    this.position = options.position;
    this.size = options.size;
    this.rotation = options.rotation;
    this.petalCount = options.petalCount;
  }

  /**
   * ランダムな花を生成
   */
  public static create(branchId: BranchId, random: RandomSource): Flower {
    return new Flower(branchId, {
      position: randomRange(random, 0.5, 1.0),
      size: randomRange(random, 15, 28),
      rotation: randomRange(random, 0, 360),
      petalCount: randomInt(random, 6, 8)
    });
  }

  public update(branch: Branch, context: FoliageContext): void {
    const { levels, sparkles, random } = context;

    if (branch.growth > FLOWER_BLOOM.BRANCH_THRESHOLD) {
      const target = constrain(levels.treble * FLOWER_BLOOM.TREBLE_GAIN, 0, 1);
      this.bloom = smoothValue(this.bloom, target, FLOWER_BLOOM.RATE);
    } else {
      this.bloom = smoothValue(this.bloom, 0, FLOWER_BLOOM.RATE);
    }

    this.emitOnRise(branch, sparkles, random);
    this.rotation += levels.treble * FLOWER_BLOOM.ROTATION_GAIN;
  }

  /**
   * 開花が閾値を超えて十分に上昇したティックだけスパークルを放出し、前ティックの開花度を記録する
   * 開花が続いている間は放出しない
   * @returns 放出した数
   */
  public emitOnRise(branch: Branch, sparkles: SparkleSystem, random: RandomSource): number {
    let count = 0;
    if (this.isRisingEdge()) {
      count = randomInt(random, FLOWER_BLOOM.MIN_SPARKLES, FLOWER_BLOOM.MAX_SPARKLES);
      sparkles.emit(branch.pointAt(this.position), count);
    }
    this.lastBloom = this.bloom;
    return count;
  }

  /**
   * 開花が閾値を超えて十分に上昇したか
   */
  public isRisingEdge(): boolean {
    return this.bloom > FLOWER_BLOOM.EMIT_THRESHOLD && this.bloom > this.lastBloom + FLOWER_BLOOM.EMIT_MIN_RISE;
  }

  public draw(surface: RenderSurface, branch: Branch): void {
    if (this.bloom <= FLOWER_BLOOM.DRAW_THRESHOLD) return;

    const center = branch.pointAt(this.position);
    const size = this.size * this.bloom;

    // 半透明の円を重ねて水彩のにじみを表現
    for (let i = 0; i < this.petalCount; i++) {
      const angle = this.rotation + i * (360 / this.petalCount);
      const petalCenter = addScaled(center, direction(angle), size * 0.4);

      surface.circle(petalCenter, size * 0.5, PALETTE.FLOWER_MID, FLOWER_BLOOM.PETAL_ALPHA);

      if (this.bloom > FLOWER_BLOOM.HIGHLIGHT_THRESHOLD) {
        const highlightCenter = addScaled(petalCenter, direction(angle + FLOWER_BLOOM.HIGHLIGHT_NUDGE), size * 0.1);
        surface.circle(highlightCenter, size * 0.3, PALETTE.FLOWER_HIGH, FLOWER_BLOOM.HIGHLIGHT_ALPHA);
      }
    }

    // 花の中心
    surface.circle(center, size * 0.15, PALETTE.FLOWER_CENTER);
  }
}
