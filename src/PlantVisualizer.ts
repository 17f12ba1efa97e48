import type { AudioLevels, CanvasSurface, Point, RawAudioLevels } from './types';
import { VIEWPORT } from './config';
import { AudioNormalizer } from './AudioNormalizer';
import { Plant } from './Plant';
import { SparkleSystem } from './SparkleSystem';
import { SceneCompositor } from './SceneCompositor';
import { drawDebugOverlay } from './DebugOverlay';
import { MathRandom, SeededRandom, type RandomSource } from './Random';

export interface VisualizerOptions {
  width?: number;
  height?: number;
  fps?: number;
  seed?: number;            // 指定するとSeededRandomを使う
  random?: RandomSource;    // seedより優先
  overlay?: boolean;        // デバッグオーバーレイを表示するか
}

/**
 * PlantVisualizerクラス
 * 1ティック = 正規化 → 木の更新（花がスパークルを放出）→ スパークル更新
 * 描画 = 背景 → 揺れるシーン（木 → スパークル）→ オーバーレイ
 */
export class PlantVisualizer {
  public readonly width: number;
  public readonly height: number;
  public readonly fps: number;

  private readonly random: RandomSource;
  private readonly normalizer = new AudioNormalizer();
  private readonly plant: Plant;
  private readonly sparkles: SparkleSystem;
  private readonly compositor: SceneCompositor;
  private readonly showOverlay: boolean;
  private levels: AudioLevels;
  private tickCount: number = 0;

  constructor(options: VisualizerOptions = {}) {
    this.width = options.width ?? VIEWPORT.WIDTH;
    this.height = options.height ?? VIEWPORT.HEIGHT;
    this.fps = options.fps ?? VIEWPORT.FPS;
    this.showOverlay = options.overlay ?? true;
    this.random = options.random ?? (options.seed !== undefined ? new SeededRandom(options.seed) : new MathRandom());

    this.plant = Plant.grow({ width: this.width, height: this.height }, this.random);
    this.sparkles = new SparkleSystem(this.random, this.fps);
    this.compositor = new SceneCompositor(this.random);
    this.levels = this.normalizer.getLevels();
  }

  /**
   * シミュレーションを1ティック進める
   * @param raw オーディオプロバイダーから読んだ生の帯域エネルギー
   * @returns 正規化後のレベル
   */
  public tick(raw: RawAudioLevels): AudioLevels {
    this.levels = this.normalizer.update(raw);
    this.plant.update(this.levels, this.sparkles, this.random);
    this.sparkles.update();
    this.tickCount++;
    return this.levels;
  }

  /**
   * 現在の状態を描画
   * @param surface 描画先
   * @param overlayLines オーバーレイに追加表示する行
   * @returns このフレームのシェイク量
   */
  public render(surface: CanvasSurface, overlayLines: readonly string[] = []): Point {
    return this.compositor.compose(
      surface,
      this.levels,
      layer => {
        this.plant.draw(layer);
        this.sparkles.draw(layer);
      },
      this.showOverlay ? screen => drawDebugOverlay(screen, this.levels, overlayLines) : undefined
    );
  }

  public getLevels(): AudioLevels {
    return this.levels;
  }

  public getPlant(): Plant {
    return this.plant;
  }

  public getSparkles(): SparkleSystem {
    return this.sparkles;
  }

  public getTickCount(): number {
    return this.tickCount;
  }
}
