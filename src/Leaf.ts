import type { BranchId, Point, RenderSurface } from './types';
import type { Branch } from './Branch';
import type { Foliage, FoliageContext } from './Foliage';
import { PALETTE } from './config';
import { constrain, lerpColor, radToDeg, degToRad, scaleColor, smoothValue } from './math';
import { pick, randomRange, type RandomSource } from './Random';

/**
 * 葉の成長パラメータ
 */
export const LEAF_GROWTH = {
  BRANCH_THRESHOLD: 0.4,    // 枝がこの成長度を超えると葉が開く
  MIDS_GAIN: 1.5,
  GROW_RATE: 0.07,          // 開く速さ
  FURL_RATE: 0.12,          // 閉じる速さ（開くより速い）
  DRAW_THRESHOLD: 0.05,
  SEGMENTS: 8,              // 片側の分割数
};

export interface LeafOptions {
  position: number;         // 枝上の相対位置（0-1）
  angleOffset: number;      // 枝の向きからの角度（度）
  length: number;
  width: number;
  curveFactor: number;      // ふくらみの強さ
}

/**
 * Leafクラス
 * 中音域で開き、枝が縮むと素早く丸まる葉
 */
export class Leaf implements Foliage {
  public readonly branchId: BranchId;
  public readonly position: number;
  public readonly angleOffset: number;
  public readonly length: number;
  public readonly width: number;
  public readonly curveFactor: number;
  public growth: number = 0;  // 0=丸まった状態、1=完全に開いた状態

  constructor(branchId: BranchId, options: LeafOptions) {
    this.branchId = branchId;
    this.position = options.position;
    this.angleOffset = options.angleOffset;
    this.length = options.length;
    this.width = options.width;
    this.curveFactor = options.curveFactor;
  }

  /**
   * ランダムな形状の葉を生成
   */
  public static create(branchId: BranchId, random: RandomSource): Leaf {
    const position = randomRange(random, 0.2, 0.8);
    const side = pick(random, [-55, 55]);
    return new Leaf(branchId, {
      position,
      angleOffset: side + randomRange(random, -10, 10),
      length: randomRange(random, 35, 70),
      width: randomRange(random, 8, 18),
      curveFactor: randomRange(random, 0.3, 0.7)
    });
  }

  public update(branch: Branch, context: FoliageContext): void {
    if (branch.growth > LEAF_GROWTH.BRANCH_THRESHOLD) {
      const target = constrain(context.levels.mids * LEAF_GROWTH.MIDS_GAIN, 0, 1);
      this.growth = smoothValue(this.growth, target, LEAF_GROWTH.GROW_RATE);
    } else {
      this.growth = smoothValue(this.growth, 0, LEAF_GROWTH.FURL_RATE);
    }
  }

  /**
   * 葉の輪郭を計算
   * 根元 → 片側8点 → 先端 → 反対側7点 の順に並ぶ閉じた多角形
   */
  public getOutline(branch: Branch): { base: Point; tip: Point; points: Point[] } {
    const end = branch.getEndPosition();
    const vx = end.x - branch.start.x;
    const vy = end.y - branch.start.y;
    const base = {
      x: branch.start.x + vx * this.position,
      y: branch.start.y + vy * this.position
    };

    const axis = degToRad(radToDeg(Math.atan2(vy, vx)) + this.angleOffset);
    const cos = Math.cos(axis);
    const sin = Math.sin(axis);
    const fullLength = this.length * this.growth;

    const sidePoint = (i: number, sign: 1 | -1): Point => {
      const t = i / LEAF_GROWTH.SEGMENTS;
      const along = t * fullLength;
      const bulge = Math.sin(t * Math.PI) * this.width * this.growth * this.curveFactor;
      return {
        x: base.x + cos * along - sign * sin * bulge,
        y: base.y + sin * along + sign * cos * bulge
      };
    };

    const tip = { x: base.x + cos * fullLength, y: base.y + sin * fullLength };
    const points: Point[] = [base];
    for (let i = 1; i <= LEAF_GROWTH.SEGMENTS; i++) {
      points.push(sidePoint(i, 1));
    }
    points.push(tip);
    for (let i = LEAF_GROWTH.SEGMENTS - 1; i > 0; i--) {
      points.push(sidePoint(i, -1));
    }

    return { base, tip, points };
  }

  public draw(surface: RenderSurface, branch: Branch): void {
    if (this.growth <= LEAF_GROWTH.DRAW_THRESHOLD) return;

    const color = lerpColor(PALETTE.LEAF_START, PALETTE.LEAF_END, this.growth);
    const { base, tip, points } = this.getOutline(branch);

    surface.polygon(points, color);
    // 葉脈
    surface.line(base, tip, 1, scaleColor(color, 0.7));
  }
}
