import type { AudioLevels, BranchId, RenderSurface } from './types';
import { Branch, type BranchOptions } from './Branch';
import { Leaf } from './Leaf';
import { Flower } from './Flower';
import type { FoliageContext } from './Foliage';
import { walkTree, type TreeVisitor } from './TreeWalk';
import { chance, randomInt, randomRange, type RandomSource } from './Random';
import type { SparkleSystem } from './SparkleSystem';

/**
 * 木の形状を決める定数
 */
export const PLANT_SHAPE = {
  ROOT_ANGLE: -90,          // 真上
  ROOT_LENGTH_RATIO: 1 / 3.5, // 画面の高さに対する幹の長さ
  ROOT_THICKNESS: 25,
  ROOT_OFFSET: 20,          // 画面下端より下から生やす
  MAX_DEPTH: 7,             // この深さ未満の枝だけが葉・花・子を持つ
  CHILD_DEPTH_LIMIT: 6,     // この深さ未満の枝だけが子を持つ
  FLOWER_MIN_DEPTH: 4,
  FLOWER_CHANCE: 0.7,
  LEAF_MIN_DEPTH: 2,
  LEAF_MAX_DEPTH: 5,
  LEAF_CHANCE: 0.8,
  MIN_CHILDREN: 1,
  MAX_CHILDREN: 3,
  CHILD_ANGLE_SPREAD: 35,   // 度
  CHILD_LENGTH_MIN: 0.6,
  CHILD_LENGTH_MAX: 0.9,
  THICKNESS_FALLOFF: 0.7,
};

export interface PlantOptions {
  width: number;
  height: number;
}

/**
 * Plantクラス
 * 枝・葉・花をアリーナ（配列）で所有し、ハンドルで相互参照する
 * 木は生成時に一度だけ作られ、以後は構造を変えずに状態だけが変化する
 */
export class Plant {
  private readonly branches: Branch[] = [];
  private readonly leaves: Leaf[] = [];
  private readonly flowers: Flower[] = [];

  private constructor() {}

  /**
   * 乱数で木を生成
   * @param options 画面サイズ（幹の位置と長さを決める）
   * @param random 乱数源（生成時にのみ使う）
   */
  public static grow(options: PlantOptions, random: RandomSource): Plant {
    const plant = new Plant();
    plant.spawnBranch({
      start: { x: options.width / 2, y: options.height + PLANT_SHAPE.ROOT_OFFSET },
      angle: PLANT_SHAPE.ROOT_ANGLE,
      maxLength: options.height * PLANT_SHAPE.ROOT_LENGTH_RATIO,
      thickness: PLANT_SHAPE.ROOT_THICKNESS,
      depth: 0
    }, random);
    return plant;
  }

  private spawnBranch(options: BranchOptions, random: RandomSource): BranchId {
    const branch = new Branch(this.branches.length, options);
    this.branches.push(branch);

    if (branch.depth < PLANT_SHAPE.MAX_DEPTH) {
      this.populate(branch, random);
    }

    return branch.id;
  }

  /**
   * 枝に花・葉・子の枝を付ける
   */
  private populate(branch: Branch, random: RandomSource): void {
    // 子の初期位置。最初の更新で親の現在の先端に置き換わる
    const anchor = branch.getFullyGrownEnd();

    if (branch.depth >= PLANT_SHAPE.FLOWER_MIN_DEPTH && chance(random, PLANT_SHAPE.FLOWER_CHANCE)) {
      branch.flowerIds.push(this.flowers.length);
      this.flowers.push(Flower.create(branch.id, random));
    }

    if (branch.depth >= PLANT_SHAPE.LEAF_MIN_DEPTH && branch.depth <= PLANT_SHAPE.LEAF_MAX_DEPTH && chance(random, PLANT_SHAPE.LEAF_CHANCE)) {
      branch.leafIds.push(this.leaves.length);
      this.leaves.push(Leaf.create(branch.id, random));
    }

    if (branch.depth < PLANT_SHAPE.CHILD_DEPTH_LIMIT) {
      const count = randomInt(random, PLANT_SHAPE.MIN_CHILDREN, PLANT_SHAPE.MAX_CHILDREN);
      for (let i = 0; i < count; i++) {
        const angle = branch.angle + randomRange(random, -PLANT_SHAPE.CHILD_ANGLE_SPREAD, PLANT_SHAPE.CHILD_ANGLE_SPREAD);
        const maxLength = branch.maxLength * randomRange(random, PLANT_SHAPE.CHILD_LENGTH_MIN, PLANT_SHAPE.CHILD_LENGTH_MAX);
        const childId = this.spawnBranch({
          start: anchor,
          angle,
          maxLength,
          thickness: Math.max(1, branch.thickness * PLANT_SHAPE.THICKNESS_FALLOFF),
          depth: branch.depth + 1
        }, random);
        branch.childIds.push(childId);
      }
    }
  }

  private walk(visitor: TreeVisitor<Branch>): void {
    walkTree(this.getRoot(), branch => branch.childIds.map(id => this.getBranch(id)), visitor);
  }

  /**
   * 1ティック分の成長を更新
   * 十分に伸びた枝だけが子に先端位置を伝えて再帰し、葉と花は常に更新する
   */
  public update(levels: AudioLevels, sparkles: SparkleSystem, random: RandomSource): void {
    const context: FoliageContext = { levels, sparkles, random };

    this.walk({
      enter: branch => {
        branch.updateGrowth(levels);
        if (!branch.isPropagating()) {
          return 'skip-children';
        }

        const end = branch.getEndPosition();
        for (const childId of branch.childIds) {
          this.getBranch(childId).start = { ...end };
        }
        return 'descend';
      },
      leave: branch => {
        for (const flowerId of branch.flowerIds) {
          this.flowers[flowerId].update(branch, context);
        }
        for (const leafId of branch.leafIds) {
          this.leaves[leafId].update(branch, context);
        }
      }
    });
  }

  /**
   * 木を描画（葉 → 子の枝 → 花 の順で、花が枝の上に重なる）
   */
  public draw(surface: RenderSurface): void {
    this.walk({
      enter: branch => {
        if (!branch.isVisible()) {
          return 'prune';
        }

        branch.draw(surface);
        for (const leafId of branch.leafIds) {
          this.leaves[leafId].draw(surface, branch);
        }
        return 'descend';
      },
      leave: branch => {
        for (const flowerId of branch.flowerIds) {
          this.flowers[flowerId].draw(surface, branch);
        }
      }
    });
  }

  public getRoot(): Branch {
    return this.getBranch(0);
  }

  public getBranch(id: BranchId): Branch {
    const branch = this.branches[id];
    if (!branch) {
      throw new Error(`枝が見つかりません: ${id}`);
    }
    return branch;
  }

  public getBranches(): readonly Branch[] {
    return this.branches;
  }

  public getLeaves(): readonly Leaf[] {
    return this.leaves;
  }

  public getFlowers(): readonly Flower[] {
    return this.flowers;
  }

  public get branchCount(): number {
    return this.branches.length;
  }

  public maxDepth(): number {
    return this.branches.reduce((max, branch) => Math.max(max, branch.depth), 0);
  }
}
