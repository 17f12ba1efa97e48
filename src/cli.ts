import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import type { AudioProvider } from './types';
import { VIEWPORT } from './config';
import { openAudioProvider } from './AudioInput';
import { PcmFileSource } from './PcmFileSource';
import { SyntheticAudioSource } from './SyntheticAudioSource';
import { PlantVisualizer } from './PlantVisualizer';
import { SvgSurface } from './SvgSurface';
import { runFrameLoop } from './FrameLoop';

async function parseArgs(args: string[]) {
  return yargs(args)
    .scriptName('sonic-arbor')
    .option('ticks', {
      alias: 't',
      type: 'number',
      description: 'Number of ticks to simulate (0 runs until interrupted)',
      default: 600,
    })
    .option('fps', {
      type: 'number',
      description: 'Tick rate',
      default: VIEWPORT.FPS,
    })
    .option('width', {
      type: 'number',
      description: 'Viewport width',
      default: VIEWPORT.WIDTH,
    })
    .option('height', {
      type: 'number',
      description: 'Viewport height',
      default: VIEWPORT.HEIGHT,
    })
    .option('seed', {
      alias: 's',
      type: 'number',
      description: 'Seed for the tree and per-frame randomness',
    })
    .option('pcm', {
      type: 'string',
      description: 'Raw signed 16-bit little-endian mono PCM file to analyze',
    })
    .option('out', {
      alias: 'o',
      type: 'string',
      description: 'Output directory for SVG frames',
      default: join(process.cwd(), 'frames'),
    })
    .option('every', {
      type: 'number',
      description: 'Write every Nth frame (0 writes only the last frame)',
      default: 60,
    })
    .option('realtime', {
      type: 'boolean',
      description: 'Pace ticks to wall-clock time',
      default: false,
    })
    .option('overlay', {
      type: 'boolean',
      description: 'Draw the level overlay',
      default: true,
    })
    .check(argv => {
      if (!(argv.fps > 0)) throw new Error('--fps must be positive');
      if (!(argv.width > 0) || !(argv.height > 0)) throw new Error('--width and --height must be positive');
      if (!(argv.ticks >= 0) || !(argv.every >= 0)) throw new Error('--ticks and --every must not be negative');
      return true;
    })
    .strict()
    .help()
    .parseAsync();
}

function frameName(tick: number): string {
  return `frame-${String(tick).padStart(5, '0')}.svg`;
}

async function main(): Promise<void> {
  const argv = await parseArgs(hideBin(process.argv));

  const visualizer = new PlantVisualizer({
    width: argv.width,
    height: argv.height,
    fps: argv.fps,
    seed: argv.seed,
    overlay: argv.overlay
  });
  console.log(`[CLI] 木を生成しました: ${visualizer.getPlant().branchCount} branches`);

  // 合成信号はティック数から時刻を決める（実時間に依存しない）
  let elapsedTicks = 0;
  const synthetic = new SyntheticAudioSource(() => (elapsedTicks * 1000) / argv.fps);

  let provider: AudioProvider;
  if (argv.pcm) {
    provider = await openAudioProvider(new PcmFileSource(argv.pcm), synthetic);
  } else {
    await synthetic.initialize();
    provider = synthetic;
  }

  await mkdir(argv.out, { recursive: true });

  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.log('[CLI] 停止要求を受け取りました');
    controller.abort();
  });

  const surface = new SvgSurface(argv.width, argv.height);
  let lastWritten = -1;

  const ticks = await runFrameLoop({
    provider,
    fps: argv.fps,
    maxTicks: argv.ticks > 0 ? argv.ticks : undefined,
    realtime: argv.realtime,
    signal: controller.signal,
    step: async (raw, tick) => {
      const frame = tick + 1;
      elapsedTicks = frame;
      visualizer.tick(raw);
      visualizer.render(surface, [`TICK: ${frame}`]);

      if (argv.every > 0 && frame % argv.every === 0) {
        await writeFile(join(argv.out, frameName(frame)), surface.toSvg(), 'utf-8');
        lastWritten = frame;
      }
    }
  });

  if (ticks > 0 && lastWritten !== ticks) {
    await writeFile(join(argv.out, frameName(ticks)), surface.toSvg(), 'utf-8');
  }

  const plant = visualizer.getPlant();
  const blooming = plant.getFlowers().filter(flower => flower.bloom > 0.5).length;
  console.log(
    `[CLI] 完了: ${ticks} ticks, root growth ${plant.getRoot().growth.toFixed(3)}, ` +
    `${blooming}/${plant.getFlowers().length} flowers blooming, ${visualizer.getSparkles().count} sparkles`
  );
}

main().catch(error => {
  console.error('[CLI] 実行エラー:', error);
  process.exitCode = 1;
});
