import { writeFile } from 'node:fs/promises';

import { createRaster, type RasterImage } from '@domain/frame-player/index.js';

import { createFramePlayer, withFramePlayer } from '@/application/frame-player/index.js';
import { CanvasDrawSurface, renderDebugOverlay } from '@/infrastructure/frame-player/index.js';

const TICK_SECONDS = 1 / 60;
const TICKS = 90;

function buildFrames(baseColor: readonly [number, number, number]): RasterImage[] {
  return Array.from({ length: 4 }, (_, index) =>
    createRaster(16 + index * 4, 16 + index * 4, [baseColor[0], baseColor[1] + index * 40, baseColor[2], 255]),
  );
}

async function main(): Promise<void> {
  const surface = CanvasDrawSurface.create(320, 240);

  withFramePlayer(
    createFramePlayer({
      frames: { idle: buildFrames([255, 60, 50]), walk: buildFrames([50, 60, 255]) },
      durations: { idle: 0.2, walk: 0.1 },
      frameScale: { width: 64, height: 64 },
      playMode: 'pingpong',
    }),
    (player) => {
      player.addStateChangeCallback((state) => console.log(`state -> ${state}`));
      player.addCompleteCallback(() => console.log(`reversed at frame ${player.frameIndex}`));

      for (let tick = 0; tick < TICKS; tick += 1) {
        if (tick === TICKS / 2) {
          player.setState('walk');
        }

        player.update(TICK_SECONDS, { direction: { flipX: tick >= TICKS / 2, flipY: false } });
        player.setCenter({ x: 160, y: 120 });
      }

      surface.clear();
      player.draw(surface);
      renderDebugOverlay(surface.context, player, { x: 8, y: 8 });
    },
  );

  await writeFile('sprite-frame.png', surface.toPng());
  console.log('Wrote sprite-frame.png');
}

main().catch((error) => {
  console.error('Failed to play sample animation', error);
  process.exitCode = 1;
});
