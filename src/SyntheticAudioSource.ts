import type { AudioProvider, RawAudioLevels } from './types';

/**
 * 決定的な合成信号（マイクが使えない時の代替）
 * 帯域ごとに周期の異なる正弦波を返すので、入力なしでも成長・開花・揺れが一巡する
 */
export class SyntheticAudioSource implements AudioProvider {
  public readonly name = 'synthetic';
  private readonly clock: () => number;

  /**
   * @param clock 現在時刻（ミリ秒）を返す関数
   */
  constructor(clock: () => number) {
    this.clock = clock;
  }

  async initialize(): Promise<void> {
    console.log('[SyntheticAudioSource] 合成信号で動作します');
  }

  readFrame(): RawAudioLevels {
    return syntheticLevels(this.clock() / 1000);
  }

  dispose(): void {}
}

/**
 * 時刻t（秒）における合成信号
 */
export function syntheticLevels(t: number): RawAudioLevels {
  return {
    volume: ((Math.sin(t * 2) + 1) / 2) * 15000,
    bass: ((Math.sin(t * 2 + Math.PI) + 1) / 2) * 1e6,
    mids: ((Math.sin(t * 4) + 1) / 2) * 1e5,
    treble: ((Math.sin(t * 8) + 1) / 2) * 1e4
  };
}
