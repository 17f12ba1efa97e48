import p5 from 'p5';
import { VIEWPORT } from './config';
import { AudioAnalyzer } from './AudioAnalyzer';
import { SyntheticAudioSource } from './SyntheticAudioSource';
import { AudioSession } from './AudioInput';
import { PlantVisualizer } from './PlantVisualizer';
import { P5Surface } from './P5Surface';

/**
 * URLの ?seed= から木のシードを読む
 */
function readSeed(): number | undefined {
  const value = new URLSearchParams(window.location.search).get('seed');
  if (value === null) return undefined;
  const seed = Number(value);
  return Number.isFinite(seed) ? seed : undefined;
}

function showError(message: string): void {
  const errorMsg = document.getElementById('error-message');
  if (errorMsg) {
    errorMsg.textContent = message;
    errorMsg.classList.remove('hidden');
  }
}

/**
 * p5.jsを使ったブラウザ版
 */
const sketch = (p: p5) => {
  let visualizer: PlantVisualizer;
  let surface: P5Surface;
  const audio = new AudioSession();

  /**
   * 初期化
   */
  p.setup = () => {
    // 画面サイズは起動時に固定（木はこのサイズで一度だけ生成される）
    p.createCanvas(p.windowWidth, p.windowHeight);
    p.frameRate(VIEWPORT.FPS);

    visualizer = new PlantVisualizer({ width: p.width, height: p.height, fps: VIEWPORT.FPS, seed: readSeed() });
    surface = new P5Surface(p);

    const microphone = new AudioAnalyzer({
      onDeviceLost: () => showError('マイクアクセスが停止されました。ページをリロードしてください。')
    });
    const synthetic = new SyntheticAudioSource(() => p.millis());

    audio
      .open(microphone, synthetic)
      .then(provider => {
        if (provider === synthetic) {
          showError('マイクを開けなかったため、合成信号で表示しています。');
        }
      })
      .catch(error => {
        console.error('[Main] 音声入力の初期化に失敗しました:', error);
        showError(error instanceof Error ? error.message : '音声入力の初期化に失敗しました');
      });
  };

  /**
   * 描画ループ（1フレーム = 音声読み込み → 更新 → 描画）
   */
  p.draw = () => {
    const raw = audio.readFrame();
    visualizer.tick(raw);
    visualizer.render(surface, [
      `INPUT: ${audio.current?.name ?? 'initializing'}`,
      `SPARKLES: ${visualizer.getSparkles().count}`,
      `FPS: ${p.frameRate().toFixed(1)}`
    ]);
  };

  /**
   * Escapeで停止し、マイクを解放
   */
  p.keyPressed = () => {
    if (p.key === 'Escape') {
      p.noLoop();
      audio.stop();
      console.log('[Main] 停止しました');
    }
  };
};

new p5(sketch);
