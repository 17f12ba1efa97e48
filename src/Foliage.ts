import type { AudioLevels, BranchId, RenderSurface } from './types';
import type { Branch } from './Branch';
import type { RandomSource } from './Random';
import type { SparkleSystem } from './SparkleSystem';

/**
 * 葉・花の更新時に渡される情報
 */
export interface FoliageContext {
  levels: AudioLevels;
  sparkles: SparkleSystem;
  random: RandomSource;
}

/**
 * 枝に付く要素（葉・花）の共通インターフェース
 * 所有する枝はハンドルで参照し、更新・描画時にアリーナから渡される
 */
export interface Foliage {
  readonly branchId: BranchId;
  update(branch: Branch, context: FoliageContext): void;
  draw(surface: RenderSurface, branch: Branch): void;
}
