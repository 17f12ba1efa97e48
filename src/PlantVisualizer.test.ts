import { describe, it, expect } from 'vitest';
import { PlantVisualizer } from './PlantVisualizer';
import { SvgSurface } from './SvgSurface';
import { syntheticLevels } from './SyntheticAudioSource';
import { PALETTE } from './config';
import { RecordingSurface, SequenceRandom, levelsOf } from './test-helpers';

function makeVisualizer(overlay = false): PlantVisualizer {
  return new PlantVisualizer({ width: 800, height: 600, fps: 60, seed: 42, overlay });
}

describe('PlantVisualizer', () => {
  describe('シナリオ', () => {
    it('一定の入力が続くと木が伸びきり、花が咲いてスパークルが出る', () => {
      const visualizer = makeVisualizer();
      let peakSparkles = 0;

      for (let i = 0; i < 200; i++) {
        visualizer.tick(levelsOf(1));
        peakSparkles = Math.max(peakSparkles, visualizer.getSparkles().count);
      }

      const plant = visualizer.getPlant();
      expect(visualizer.getTickCount()).toBe(200);
      expect(visualizer.getLevels().mids).toBeGreaterThan(0.99);
      expect(plant.getRoot().growth).toBeGreaterThan(0.95);
      expect(plant.getFlowers().some(flower => flower.bloom > 0.5)).toBe(true);
      expect(peakSparkles).toBeGreaterThan(0);
    });

    it('無音が続くと木は縮み、描画は背景だけになる', () => {
      const visualizer = makeVisualizer();
      for (let i = 0; i < 200; i++) {
        visualizer.tick(levelsOf(1));
      }

      const root = visualizer.getPlant().getRoot();
      let previous = root.growth;
      for (let i = 0; i < 100; i++) {
        visualizer.tick(levelsOf(0));
        expect(root.growth).toBeLessThan(previous);
        previous = root.growth;
      }
      expect(root.growth).toBeLessThan(0.01);
      expect(visualizer.getSparkles().count).toBe(0);

      const surface = new RecordingSurface();
      visualizer.render(surface);

      expect(surface.calls).toEqual([{ type: 'background', color: PALETTE.BACKGROUND }]);
    });

    it('同じシードと入力なら同じフレームになる', () => {
      const frames = [makeVisualizer(true), makeVisualizer(true)].map(visualizer => {
        for (let i = 0; i < 120; i++) {
          visualizer.tick(syntheticLevels(i / 60));
        }
        const surface = new SvgSurface(800, 600);
        visualizer.render(surface);
        return surface.toSvg();
      });

      expect(frames[0]).toBe(frames[1]);
      expect(frames[0]).toContain('<line');
    });
  });

  describe('入力', () => {
    it('不正な値は無音として扱う', () => {
      const visualizer = makeVisualizer();
      const levels = visualizer.tick({ volume: Number.NaN, bass: -1, mids: Number.POSITIVE_INFINITY, treble: 0 });

      expect(levels).toEqual({ volume: 0, bass: 0, mids: 0, treble: 0 });
    });
  });

  describe('描画', () => {
    it('オーバーレイに帯域と追加の行を表示する', () => {
      const visualizer = makeVisualizer(true);
      visualizer.tick(levelsOf(1));
      const surface = new RecordingSurface();

      visualizer.render(surface, ['INPUT: test']);

      const texts = surface.ofType('text').map(call => call.content);
      expect(texts).toEqual(['VOLUME: 0.35', 'BASS: 0.35', 'MIDS: 0.35', 'TREBLE: 0.35', 'INPUT: test']);
    });

    it('渡した乱数源でシェイクを引く', () => {
      const visualizer = new PlantVisualizer({ width: 800, height: 600, random: new SequenceRandom([0.75]), overlay: false });
      visualizer.tick(levelsOf(1));

      // bass 0.35 → 揺れ2.8、乱数0.75 → 0.5倍
      const offset = visualizer.render(new RecordingSurface());

      expect(offset.x).toBeCloseTo(1.4, 10);
      expect(offset.y).toBeCloseTo(1.4, 10);
    });
  });
});
