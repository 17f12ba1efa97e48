import { AUDIO_BANDS, type AudioLevels, type CanvasSurface } from './types';
import { PALETTE } from './config';

const LAYOUT = {
  LEFT: 10,
  TOP: 10,
  ROW_HEIGHT: 25,
  BAR_LEFT: 100,
  BAR_WIDTH: 200,
  BAR_HEIGHT: 10,
  BAR_OFFSET: 4,
  TEXT_SIZE: 16,
};

/**
 * 帯域ごとのレベルをバーで表示するデバッグ用オーバーレイ
 */
export function drawDebugOverlay(surface: CanvasSurface, levels: AudioLevels, lines: readonly string[] = []): void {
  let y = LAYOUT.TOP;

  for (const band of AUDIO_BANDS) {
    const value = levels[band];
    surface.text(`${band.toUpperCase()}: ${value.toFixed(2)}`, { x: LAYOUT.LEFT, y }, PALETTE.OVERLAY_TEXT, LAYOUT.TEXT_SIZE);
    surface.polygon(barRect(y, LAYOUT.BAR_WIDTH), PALETTE.OVERLAY_TRACK);
    if (value > 0) {
      surface.polygon(barRect(y, value * LAYOUT.BAR_WIDTH), PALETTE.OVERLAY_BAR);
    }
    y += LAYOUT.ROW_HEIGHT;
  }

  for (const line of lines) {
    surface.text(line, { x: LAYOUT.LEFT, y }, PALETTE.OVERLAY_TEXT, LAYOUT.TEXT_SIZE);
    y += LAYOUT.ROW_HEIGHT;
  }
}

function barRect(y: number, width: number) {
  const top = y + LAYOUT.BAR_OFFSET;
  const bottom = top + LAYOUT.BAR_HEIGHT;
  const right = LAYOUT.BAR_LEFT + width;
  return [
    { x: LAYOUT.BAR_LEFT, y: top },
    { x: right, y: top },
    { x: right, y: bottom },
    { x: LAYOUT.BAR_LEFT, y: bottom }
  ];
}
