import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { SeededRandom, chance, pick, randomInt, randomRange } from './Random';
import { SequenceRandom } from './test-helpers';

describe('Random', () => {
  describe('SeededRandom', () => {
    it('同じシードなら同じ列を返す', () => {
      const a = new SeededRandom(1234);
      const b = new SeededRandom(1234);
      const seqA = Array.from({ length: 20 }, () => a.next());
      const seqB = Array.from({ length: 20 }, () => b.next());

      expect(seqA).toEqual(seqB);
    });

    it('異なるシードなら異なる列を返す', () => {
      const a = new SeededRandom(1);
      const b = new SeededRandom(2);

      expect(a.next()).not.toBe(b.next());
    });

    it('シード0でも0に張り付かない', () => {
      const random = new SeededRandom(0);
      const values = Array.from({ length: 10 }, () => random.next());

      expect(values.some(value => value > 0)).toBe(true);
    });

    it('Property: any seed yields values in [0, 1)', () => {
      fc.assert(
        fc.property(fc.integer(), seed => {
          const random = new SeededRandom(seed);
          for (let i = 0; i < 50; i++) {
            const value = random.next();
            expect(value).toBeGreaterThanOrEqual(0);
            expect(value).toBeLessThan(1);
          }
        }),
        { numRuns: 100 }
      );
    });
  });

  describe('ヘルパー', () => {
    it('randomRangeは[min, max)に線形に写す', () => {
      expect(randomRange(new SequenceRandom([0]), -35, 35)).toBe(-35);
      expect(randomRange(new SequenceRandom([0.5]), -35, 35)).toBe(0);
      expect(randomRange(new SequenceRandom([0.25]), 0, 360)).toBe(90);
    });

    it('randomIntは両端を含む', () => {
      expect(randomInt(new SequenceRandom([0]), 1, 3)).toBe(1);
      expect(randomInt(new SequenceRandom([0.999]), 1, 3)).toBe(3);
      expect(randomInt(new SequenceRandom([0.5]), 6, 8)).toBe(7);
    });

    it('chanceは乱数がpより小さい時にtrue', () => {
      expect(chance(new SequenceRandom([0.69]), 0.7)).toBe(true);
      expect(chance(new SequenceRandom([0.7]), 0.7)).toBe(false);
    });

    it('pickは要素を1つ選ぶ', () => {
      expect(pick(new SequenceRandom([0.1]), [-55, 55])).toBe(-55);
      expect(pick(new SequenceRandom([0.6]), [-55, 55])).toBe(55);
    });

    it('Property: randomInt stays within its inclusive bounds', () => {
      fc.assert(
        fc.property(fc.integer(), fc.integer({ min: -100, max: 100 }), fc.integer({ min: 0, max: 10 }), (seed, min, span) => {
          const random = new SeededRandom(seed);
          for (let i = 0; i < 20; i++) {
            const value = randomInt(random, min, min + span);
            expect(Number.isInteger(value)).toBe(true);
            expect(value).toBeGreaterThanOrEqual(min);
            expect(value).toBeLessThanOrEqual(min + span);
          }
        }),
        { numRuns: 100 }
      );
    });
  });
});
