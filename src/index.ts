import { Actions } from './core/Actions';
import { ScreenFrameSource } from './core/Capture';
import { systemClock } from './core/Clock';
import { loadSettings } from './core/Config';
import { ConfigStore } from './core/ConfigStore';
import { createLogger, errorMessage, setLogLevel } from './core/Logger';
import { createRandom } from './core/Random';
import { ScreenAnalyzer } from './core/ScreenAnalyzer';
import { BotRunner } from './farming/BotRunner';
import { FarmingBehavior } from './farming/FarmingBehavior';
import { ControlServer, startControlServer } from './server/ControlServer';

const logger = createLogger();

let _shuttingDown = false;

function setupShutdown(runner: BotRunner, server: ControlServer | null) {
  const shutdown = (signal: string) => {
    if (_shuttingDown) return;
    _shuttingDown = true;
    logger.info(`Shutdown requested (${signal}). Stopping bot...`);
    runner.stop();
    const closing = server ? server.close() : Promise.resolve();
    closing
      .catch((e: unknown) => logger.warn(`server close: ${errorMessage(e)}`))
      .finally(() => {
        // даём текущему тику завершиться
        setTimeout(() => process.exit(0), 500);
      });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

async function main() {
  const store = new ConfigStore(loadSettings());
  const settings = store.read();
  setLogLevel(settings.logLevel);
  store.onChange((s) => setLogLevel(s.logLevel));

  logger.info(`Starting bot (actions ${settings.actions.enableActions ? 'enabled' : 'dry-run'})`);

  // Актуатор и захват создаются один раз; изменение actions/capture требует перезапуска.
  const roi = settings.capture.roi;
  const behavior = new FarmingBehavior({
    perception: new ScreenAnalyzer(systemClock),
    actuator: new Actions(settings.actions, roi ? { x: roi.x, y: roi.y } : undefined),
    clock: systemClock,
    random: createRandom(),
  });
  const frames = new ScreenFrameSource({
    timeoutMs: settings.capture.timeoutMs,
    roi: roi ?? undefined,
  });
  const runner = new BotRunner(behavior, frames, store, systemClock);

  const runInBackground = () => {
    if (runner.isRunning) return;
    runner.start().catch((e: unknown) => logger.error(`runner: ${errorMessage(e)}`));
  };

  let server: ControlServer | null = null;
  if (settings.server.enabled) {
    const srv = startControlServer(settings.server.port, {
      getStatus: () => ({ running: runner.isRunning, state: behavior.stateName }),
      getSnapshot: () => behavior.snapshot(),
      start: runInBackground,
      stop: () => runner.stop(),
      getConfig: () => store.read(),
      setConfig: async (patch) => { await store.update(patch); },
    });
    behavior.stats.onKill((kill) => srv.notify({ type: 'kill', kill }));
    server = srv;
    logger.info('Control server ready. POST /api/start to launch the bot.');
  } else {
    runInBackground();
  }
  setupShutdown(runner, server);
}

main().catch((e) => {
  // Last-chance error log to console
  // eslint-disable-next-line no-console
  console.error(e);
  process.exit(1);
});
