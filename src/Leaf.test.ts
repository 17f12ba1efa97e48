import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { Leaf } from './Leaf';
import { Branch } from './Branch';
import { SparkleSystem } from './SparkleSystem';
import { SeededRandom } from './Random';
import type { FoliageContext } from './Foliage';
import { PALETTE } from './config';
import { RecordingSurface, levelsOf } from './test-helpers';

function makeBranch(growth: number): Branch {
  const branch = new Branch(0, { start: { x: 0, y: 0 }, angle: 0, maxLength: 100, thickness: 10, depth: 2 });
  branch.growth = growth;
  return branch;
}

function makeLeaf(): Leaf {
  return new Leaf(0, { position: 0.5, angleOffset: 90, length: 40, width: 10, curveFactor: 0.5 });
}

function contextWith(mids: number): FoliageContext {
  const random = new SeededRandom(7);
  return { levels: { ...levelsOf(0), mids }, sparkles: new SparkleSystem(random), random };
}

describe('Leaf', () => {
  describe('成長', () => {
    it('枝の成長度が0.4を超えると中音域に向かって開く', () => {
      const leaf = makeLeaf();
      leaf.update(makeBranch(0.5), contextWith(0.5));

      // 目標 = 0.5 × 1.5 = 0.75、係数0.07
      expect(leaf.growth).toBeCloseTo(0.0525, 12);
    });

    it('目標は1で頭打ちになる', () => {
      const leaf = makeLeaf();
      leaf.update(makeBranch(1), contextWith(1));

      expect(leaf.growth).toBeCloseTo(0.07, 12);
    });

    it('枝が0.4以下なら係数0.12で丸まる', () => {
      const leaf = makeLeaf();
      leaf.growth = 1;
      leaf.update(makeBranch(0.4), contextWith(1));

      expect(leaf.growth).toBeCloseTo(0.88, 12);
    });

    it('丸まる速さは開く速さより速い', () => {
      const opening = makeLeaf();
      opening.update(makeBranch(1), contextWith(1));

      const closing = makeLeaf();
      closing.growth = 1;
      closing.update(makeBranch(0), contextWith(0));

      expect(1 - closing.growth).toBeGreaterThan(opening.growth);
    });
  });

  describe('輪郭', () => {
    it('根元・片側8点・先端・反対側7点の17点', () => {
      const leaf = makeLeaf();
      leaf.growth = 1;

      const { base, tip, points } = leaf.getOutline(makeBranch(1));

      expect(points).toHaveLength(17);
      expect(points[0]).toEqual(base);
      expect(points[9]).toEqual(tip);
      expect(base).toEqual({ x: 50, y: 0 });
      expect(tip.x).toBeCloseTo(50, 10);
      expect(tip.y).toBeCloseTo(40, 10);
    });

    it('中央の点は両側にふくらむ', () => {
      const leaf = makeLeaf();
      leaf.growth = 1;

      const { points } = leaf.getOutline(makeBranch(1));

      // t=0.5: along=20、bulge=sin(π/2)×10×0.5=5
      expect(points[4].x).toBeCloseTo(45, 10);
      expect(points[4].y).toBeCloseTo(20, 10);
      expect(points[13].x).toBeCloseTo(55, 10);
      expect(points[13].y).toBeCloseTo(20, 10);
    });

    it('根元の位置は枝の現在の長さに追従する', () => {
      const leaf = makeLeaf();
      leaf.growth = 1;

      const { base } = leaf.getOutline(makeBranch(0.5));

      expect(base).toEqual({ x: 25, y: 0 });
    });
  });

  describe('描画', () => {
    it('成長度0.05以下では描画しない', () => {
      const leaf = makeLeaf();
      leaf.growth = 0.05;
      const surface = new RecordingSurface();

      leaf.draw(surface, makeBranch(1));

      expect(surface.calls).toHaveLength(0);
    });

    it('多角形と葉脈を描く', () => {
      const leaf = makeLeaf();
      leaf.growth = 1;
      const surface = new RecordingSurface();

      leaf.draw(surface, makeBranch(1));

      const [polygon] = surface.ofType('polygon');
      const [vein] = surface.ofType('line');
      expect(surface.calls.map(call => call.type)).toEqual(['polygon', 'line']);
      expect(polygon.points).toHaveLength(17);
      expect(polygon.color).toEqual(PALETTE.LEAF_END);
      expect(vein.width).toBe(1);
      expect(vein.from).toEqual({ x: 50, y: 0 });
      expect(vein.color.r).toBeLessThan(PALETTE.LEAF_END.r);
      expect(vein.color.g).toBeLessThan(PALETTE.LEAF_END.g);
      expect(vein.color.b).toBeLessThan(PALETTE.LEAF_END.b);
    });
  });

  describe('Property-Based Tests', () => {
    it('generated leaves stay within their shape ranges', () => {
      fc.assert(
        fc.property(fc.integer(), seed => {
          const leaf = Leaf.create(3, new SeededRandom(seed));

          expect(leaf.branchId).toBe(3);
          expect(leaf.position).toBeGreaterThanOrEqual(0.2);
          expect(leaf.position).toBeLessThan(0.8);
          expect(Math.abs(leaf.angleOffset)).toBeGreaterThanOrEqual(45);
          expect(Math.abs(leaf.angleOffset)).toBeLessThanOrEqual(65);
          expect(leaf.length).toBeGreaterThanOrEqual(35);
          expect(leaf.length).toBeLessThan(70);
          expect(leaf.width).toBeGreaterThanOrEqual(8);
          expect(leaf.width).toBeLessThan(18);
          expect(leaf.curveFactor).toBeGreaterThanOrEqual(0.3);
          expect(leaf.curveFactor).toBeLessThan(0.7);
          expect(leaf.growth).toBe(0);
        }),
        { numRuns: 100 }
      );
    });

    it('leaf growth stays within [0, 1] for any sequence of levels', () => {
      fc.assert(
        fc.property(
          fc.array(fc.tuple(fc.double({ min: 0, max: 1, noNaN: true }), fc.double({ min: 0, max: 1, noNaN: true })), { minLength: 1, maxLength: 100 }),
          steps => {
            const leaf = makeLeaf();
            for (const [branchGrowth, mids] of steps) {
              leaf.update(makeBranch(branchGrowth), contextWith(mids));
              expect(leaf.growth).toBeGreaterThanOrEqual(0);
              expect(leaf.growth).toBeLessThanOrEqual(1);
            }
          }
        ),
        { numRuns: 100 }
      );
    });
  });
});
