import { setImmediate as yieldToEventLoop, setTimeout as sleep } from 'node:timers/promises';
import type { AudioProvider, RawAudioLevels } from './types';
import { readLevelsSafely } from './AudioInput';

export interface FrameLoopOptions {
  /** 開いた状態のプロバイダー。ループが所有し、終了時に必ず解放する */
  provider: AudioProvider;
  fps: number;
  /** このティック数で終了（省略時は停止シグナルまで続ける） */
  maxTicks?: number;
  /** trueなら実時間に合わせて待つ。falseならティック間でイベントループに譲るだけ */
  realtime?: boolean;
  signal?: AbortSignal;
  /** 1ティック分の処理（音声読み込み後に呼ばれる） */
  step: (raw: RawAudioLevels, tick: number) => void | Promise<void>;
}

/**
 * 固定ティックのループを実行
 * 停止シグナルは実行中のティックが終わってから反映される
 * @returns 実行したティック数
 */
export async function runFrameLoop(options: FrameLoopOptions): Promise<number> {
  const { provider, fps, maxTicks, realtime = false, signal, step } = options;
  const frameMs = 1000 / fps;
  let tick = 0;

  console.log(`[FrameLoop] 開始: ${provider.name}, ${fps}fps${maxTicks !== undefined ? `, ${maxTicks} ticks` : ''}`);

  try {
    const startedAt = performance.now();

    while (!signal?.aborted && (maxTicks === undefined || tick < maxTicks)) {
      const raw = readLevelsSafely(provider);
      await step(raw, tick);
      tick++;

      if (realtime) {
        const wait = startedAt + tick * frameMs - performance.now();
        await sleep(Math.max(0, wait));
      } else {
        await yieldToEventLoop();
      }
    }
  } finally {
    provider.dispose();
    console.log(`[FrameLoop] 終了: ${tick} ticks`);
  }

  return tick;
}
