import { describe, it, expect, beforeEach } from 'vitest';
import * as fc from 'fast-check';
import { AudioNormalizer, sanitizeEnergy } from './AudioNormalizer';
import { AUDIO_BANDS } from './types';

describe('AudioNormalizer', () => {
  let normalizer: AudioNormalizer;

  beforeEach(() => {
    normalizer = new AudioNormalizer();
  });

  describe('Unit Tests', () => {
    it('初期状態はレベル0、ピーク1e-5', () => {
      expect(normalizer.getLevels()).toEqual({ volume: 0, bass: 0, mids: 0, treble: 0 });
      expect(normalizer.getPeaks().bass).toBe(1e-5);
    });

    it('最初の入力は自分自身がピークになり、レベルは0.35だけ近づく', () => {
      const levels = normalizer.update({ volume: 0, bass: 10, mids: 0, treble: 0 });

      expect(levels.bass).toBeCloseTo(0.35, 10);
      expect(normalizer.getPeaks().bass).toBeCloseTo(9.99, 10);
      expect(levels.volume).toBe(0);
    });

    it('無音でもNaNにならない', () => {
      for (let i = 0; i < 10; i++) {
        normalizer.update({ volume: 0, bass: 0, mids: 0, treble: 0 });
      }

      for (const band of AUDIO_BANDS) {
        expect(normalizer.getLevels()[band]).toBe(0);
        expect(Number.isNaN(normalizer.getPeaks()[band])).toBe(false);
      }
    });

    it('不正な入力は0として扱う', () => {
      const levels = normalizer.update({ volume: Number.NaN, bass: Number.POSITIVE_INFINITY, mids: -3, treble: 'loud' });

      expect(levels).toEqual({ volume: 0, bass: 0, mids: 0, treble: 0 });
      for (const band of AUDIO_BANDS) {
        expect(normalizer.getPeaks()[band]).toBeCloseTo(1e-5 * 0.999, 15);
      }
    });

    it('欠けた帯域は0として扱う', () => {
      const levels = normalizer.update({ mids: 4 });

      expect(levels.mids).toBeCloseTo(0.35, 10);
      expect(levels.volume).toBe(0);
      expect(levels.bass).toBe(0);
      expect(levels.treble).toBe(0);
    });

    it('スパイク後の無音でピークとレベルが減衰する', () => {
      normalizer.update({ volume: 0, bass: 1000, mids: 0, treble: 0 });
      let previous = normalizer.getLevels().bass;

      for (let i = 0; i < 50; i++) {
        const { bass } = normalizer.update({ volume: 0, bass: 0, mids: 0, treble: 0 });
        expect(bass).toBeLessThan(previous);
        previous = bass;
      }

      // ピーク: 1000 × 0.999^51、レベル: 0.35 × 0.65^50
      expect(normalizer.getPeaks().bass).toBeCloseTo(1000 * Math.pow(0.999, 51), 8);
      expect(normalizer.getLevels().bass).toBeCloseTo(0.35 * Math.pow(0.65, 50), 15);
    });

    it('小さくなった音量はピークの減衰とともに再び1付近まで正規化される', () => {
      normalizer.update({ volume: 0, bass: 1000, mids: 0, treble: 0 });

      for (let i = 0; i < 100; i++) {
        normalizer.update({ volume: 0, bass: 100, mids: 0, treble: 0 });
      }
      // ピーク ≈ 999 × 0.999^99 ≈ 904.8 なのでレベルは約0.11
      expect(normalizer.getLevels().bass).toBeCloseTo(0.11, 2);

      for (let i = 0; i < 3000; i++) {
        normalizer.update({ volume: 0, bass: 100, mids: 0, treble: 0 });
      }
      expect(normalizer.getLevels().bass).toBeGreaterThan(0.99);
      expect(normalizer.getLevels().bass).toBeLessThanOrEqual(1);
    });

    it('resetで初期状態に戻る', () => {
      normalizer.update({ volume: 5, bass: 5, mids: 5, treble: 5 });
      normalizer.reset();

      expect(normalizer.getLevels()).toEqual({ volume: 0, bass: 0, mids: 0, treble: 0 });
      expect(normalizer.getPeaks().treble).toBe(1e-5);
    });

    it('getLevelsは内部状態のコピーを返す', () => {
      const levels = normalizer.update({ volume: 1, bass: 1, mids: 1, treble: 1 });
      normalizer.update({ volume: 1, bass: 1, mids: 1, treble: 1 });

      expect(levels.bass).toBeCloseTo(0.35, 10);
      expect(normalizer.getLevels().bass).toBeGreaterThan(0.35);
    });
  });

  describe('sanitizeEnergy', () => {
    it('有限の非負数はそのまま返す', () => {
      expect(sanitizeEnergy(0)).toBe(0);
      expect(sanitizeEnergy(123.5)).toBe(123.5);
    });

    it('それ以外は0を返す', () => {
      expect(sanitizeEnergy(-1)).toBe(0);
      expect(sanitizeEnergy(Number.NaN)).toBe(0);
      expect(sanitizeEnergy(Number.NEGATIVE_INFINITY)).toBe(0);
      expect(sanitizeEnergy(undefined)).toBe(0);
      expect(sanitizeEnergy('10')).toBe(0);
    });
  });

  describe('Property-Based Tests', () => {
    const energy = fc.double({ min: 0, max: 1e9, noNaN: true });
    const frame = fc.record({ volume: energy, bass: energy, mids: energy, treble: energy });

    /**
     * 任意の非負の入力列に対して、レベルは常に[0, 1]に収まる
     */
    it('levels stay within [0, 1] for any non-negative input sequence', () => {
      fc.assert(
        fc.property(fc.array(frame, { minLength: 1, maxLength: 200 }), frames => {
          const subject = new AudioNormalizer();
          for (const raw of frames) {
            const levels = subject.update(raw);
            for (const band of AUDIO_BANDS) {
              expect(levels[band]).toBeGreaterThanOrEqual(0);
              expect(levels[band]).toBeLessThanOrEqual(1);
            }
          }
        }),
        { numRuns: 100 }
      );
    });

    /**
     * 任意の入力（不正値を含む）に対して、ピークは常に正で有限
     */
    it('peaks stay positive and finite even with invalid input', () => {
      const anything = fc.oneof(energy, fc.constant(Number.NaN), fc.constant(Number.POSITIVE_INFINITY), fc.double({ min: -1e6, max: -1e-6, noNaN: true }));
      const noisyFrame = fc.record({ volume: anything, bass: anything, mids: anything, treble: anything });

      fc.assert(
        fc.property(fc.array(noisyFrame, { minLength: 1, maxLength: 100 }), frames => {
          const subject = new AudioNormalizer();
          for (const raw of frames) {
            subject.update(raw);
          }
          for (const band of AUDIO_BANDS) {
            const peak = subject.getPeaks()[band];
            expect(peak).toBeGreaterThan(0);
            expect(Number.isFinite(peak)).toBe(true);
          }
        }),
        { numRuns: 100 }
      );
    });
  });
});
