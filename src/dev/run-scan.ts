import { ImageDataLike, captureImageData, loadPngFrame } from '../core/Capture';
import { systemClock } from '../core/Clock';
import { loadSettings } from '../core/Config';
import { createLogger, setLogLevel } from '../core/Logger';
import { ScreenAnalyzer } from '../core/ScreenAnalyzer';
import { STATUS_BAR_KINDS } from '../core/StatusBar';

// Офлайн-прогон распознавания: run-scan [frame.png]; без аргумента: живой скриншот.
async function main() {
  const logger = createLogger('run-scan');
  const settings = loadSettings();
  setLogLevel(settings.logLevel);
  const file = process.argv[2];
  let frame: ImageDataLike;
  if (file) {
    logger.info(`кадр из ${file}`);
    frame = loadPngFrame(file);
  } else {
    logger.info('кадр с экрана');
    frame = await captureImageData(settings.capture.roi ?? undefined);
  }
  logger.info(`кадр ${frame.width}x${frame.height}`);

  const analyzer = new ScreenAnalyzer(systemClock);
  const view = analyzer.refresh(frame, settings.detection);
  for (const k of STATUS_BAR_KINDS) {
    const b = view.bars[k];
    logger.info(`${k}: ${b.detected ? `${b.percentage}% (w=${b.width})` : 'не найдена'}`);
  }
  logger.info(`персонаж: ${view.alive}`);
  const t = view.target;
  logger.info(
    t.onScreen && t.marker
      ? `маркер ${t.markerColor} @(${t.marker.x},${t.marker.y}) d=${Math.round(t.distance)} npc=${t.npc} mover=${t.mover}`
      : 'маркер цели не найден',
  );

  const mobs = analyzer.findMobs(frame, settings.detection);
  logger.info(`мобов: ${mobs.length}`);
  for (const m of mobs) {
    logger.info(`  ${m.type} @(${m.bbox.x},${m.bbox.y}) ${m.bbox.width}x${m.bbox.height}`);
  }
}

main().catch((e) => {
  // eslint-disable-next-line no-console
  console.error(e);
  process.exit(1);
});
