import type { AudioLevels, BranchId, FlowerId, LeafId, Point, RenderSurface } from './types';
import { PALETTE } from './config';
import { addScaled, constrain, direction, lerpPoint, smoothValue } from './math';

/**
 * 枝の成長パラメータ
 */
export const BRANCH_GROWTH = {
  MIDS_GAIN: 1.2,           // 目標成長度 = mids × 1.2
  RATE: 0.06,               // 成長のスムージング係数
  PULSE_GAIN: 0.1,          // 低音による脈動の強さ
  PULSE_DEPTH_LIMIT: 4,     // この深さ以上の枝は脈動しない
  PROPAGATE_THRESHOLD: 0.05, // 子へ更新を伝える最小成長度
  DRAW_THRESHOLD: 0.01,     // 描画する最小成長度
};

export interface BranchOptions {
  start: Point;
  angle: number;            // 方向（度、画面座標）
  maxLength: number;
  thickness: number;
  depth: number;
}

/**
 * Branchクラス
 * 木の1本の枝。子・葉・花はアリーナ内のハンドルで参照する
 */
export class Branch {
  public readonly id: BranchId;
  public start: Point;
  public readonly angle: number;
  public readonly maxLength: number;
  public readonly thickness: number;
  public readonly depth: number;

  public growth: number = 0;  // 成長度（0-1）
  public pulse: number = 1;   // 低音による太さの倍率

  public readonly childIds: BranchId[] = [];
  public readonly leafIds: LeafId[] = [];
  public readonly flowerIds: FlowerId[] = [];

  private readonly dir: Point;

  constructor(id: BranchId, options: BranchOptions) {
    this.id = id;
    this.start = { ...options.start };
    this.angle = options.angle;
    this.maxLength = options.maxLength;
    this.thickness = options.thickness;
    this.depth = options.depth;
    this.dir = direction(options.angle);
  }

  /**
   * 現在の成長度での先端位置
   */
  public getEndPosition(): Point {
    return addScaled(this.start, this.dir, this.maxLength * this.growth);
  }

  /**
   * 完全に伸びた場合の先端位置（生成時の子の初期位置にのみ使う）
   */
  public getFullyGrownEnd(): Point {
    return addScaled(this.start, this.dir, this.maxLength);
  }

  /**
   * 枝上の相対位置（0=根元、1=現在の先端）のワールド座標
   */
  public pointAt(position: number): Point {
    return lerpPoint(this.start, this.getEndPosition(), position);
  }

  /**
   * 音声レベルから成長度と脈動を更新
   */
  public updateGrowth(levels: AudioLevels): void {
    const target = constrain(levels.mids * BRANCH_GROWTH.MIDS_GAIN, 0, 1);
    this.growth = smoothValue(this.growth, target, BRANCH_GROWTH.RATE);
    this.pulse = 1 + levels.bass * BRANCH_GROWTH.PULSE_GAIN * Math.max(0, BRANCH_GROWTH.PULSE_DEPTH_LIMIT - this.depth);
  }

  /**
   * 子へ更新を伝えるか（枝が見える程度に伸びているか）
   */
  public isPropagating(): boolean {
    return this.growth > BRANCH_GROWTH.PROPAGATE_THRESHOLD;
  }

  public isVisible(): boolean {
    return this.growth > BRANCH_GROWTH.DRAW_THRESHOLD;
  }

  /**
   * 描画時の線幅（最小1）
   */
  public getStrokeWidth(): number {
    return Math.max(1, Math.round(this.thickness * this.growth * this.pulse));
  }

  /**
   * 枝本体の線を描画
   */
  public draw(surface: RenderSurface): void {
    surface.line(this.start, this.getEndPosition(), this.getStrokeWidth(), PALETTE.BRANCH);
  }
}
