import type { AudioProvider, RawAudioLevels } from './types';

/**
 * 無音フレーム
 */
export const ZERO_LEVELS: Readonly<RawAudioLevels> = Object.freeze({ volume: 0, bass: 0, mids: 0, treble: 0 });

/**
 * オーディオプロバイダーを開く
 * 主プロバイダーの初期化に失敗した場合は、解放してから代替プロバイダーを使う
 * @param primary マイクやファイルなど本来の入力
 * @param fallback 合成信号など、必ず初期化できる入力
 */
export async function openAudioProvider(primary: AudioProvider, fallback: AudioProvider): Promise<AudioProvider> {
  try {
    await primary.initialize();
    console.log(`[AudioInput] 入力: ${primary.name}`);
    return primary;
  } catch (error) {
    console.error(`[AudioInput] ${primary.name} を開けませんでした。${fallback.name} で続行します:`, error);
    primary.dispose();
  }

  await fallback.initialize();
  console.log(`[AudioInput] 入力: ${fallback.name}`);
  return fallback;
}

/**
 * 1フレーム読む
 * 読み込みに失敗した場合は警告を出して無音フレームを返し、シミュレーションは継続する
 */
export function readLevelsSafely(provider: AudioProvider): RawAudioLevels {
  try {
    return provider.readFrame();
  } catch (error) {
    console.warn(`[AudioInput] ${provider.name} の読み込みに失敗しました:`, error);
    return { ...ZERO_LEVELS };
  }
}

/**
 * 開いている入力を1つ保持し、停止時に解放する
 * 初期化の完了前に停止された場合は、完了した時点で解放する
 */
export class AudioSession {
  private provider: AudioProvider | null = null;
  private stopped = false;

  /**
   * 入力を開く
   * @returns 使用するプロバイダー。開いている間に停止された場合はnull
   */
  public async open(primary: AudioProvider, fallback: AudioProvider): Promise<AudioProvider | null> {
    const provider = await openAudioProvider(primary, fallback);
    if (this.stopped) {
      provider.dispose();
      console.log(`[AudioInput] 停止済みのため ${provider.name} を解放しました`);
      return null;
    }
    this.provider = provider;
    return provider;
  }

  public get current(): AudioProvider | null {
    return this.provider;
  }

  public isStopped(): boolean {
    return this.stopped;
  }

  /**
   * 1フレーム読む（入力がまだ開いていなければ無音）
   */
  public readFrame(): RawAudioLevels {
    return this.provider ? readLevelsSafely(this.provider) : { ...ZERO_LEVELS };
  }

  public stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    this.provider?.dispose();
    this.provider = null;
  }
}
