import type { FrameSource } from '../core/Capture';
import type { Clock } from '../core/Clock';
import type { ConfigStore } from '../core/ConfigStore';
import { createLogger, errorMessage } from '../core/Logger';
import type { FarmingBehavior, TickResult } from './FarmingBehavior';

const Logger = createLogger('Runner');

/**
 * Цикл тиков: захват → тик → пауза до следующего периода. Тики никогда не перекрываются.
 * stop() срабатывает на границе тика.
 */
export class BotRunner {
  private running = false;
  private stopped = false;
  private ticks = 0;

  constructor(
    private readonly behavior: FarmingBehavior,
    private readonly frames: FrameSource,
    private readonly config: ConfigStore,
    private readonly clock: Clock,
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  get tickCount(): number {
    return this.ticks;
  }

  stop(): void {
    this.stopped = true;
  }

  async runOnce(): Promise<TickResult> {
    const settings = this.config.read();
    const frame = await this.frames.capture();
    const res = await this.behavior.tick(frame, settings);
    this.ticks++;
    return res;
  }

  /**
   * Крутит тики до stop(), запроса поведения на остановку или maxTicks.
   */
  async start(maxTicks = Number.POSITIVE_INFINITY): Promise<void> {
    if (this.running) { Logger.warn('уже запущен'); return; }
    this.running = true;
    this.stopped = false;
    this.behavior.resume();
    Logger.info('старт');
    try {
      let n = 0;
      while (!this.stopped && n < maxTicks) {
        const started = this.clock.now();
        try {
          const res = await this.runOnce();
          Logger.debug(`tick ${this.ticks}: ${res.outcome} [${res.state}]`);
        } catch (e) {
          Logger.error(`tick ${this.ticks}: ${errorMessage(e)}`);
        }
        n++;
        if (this.behavior.stopRequested) {
          Logger.warn('поведение запросило остановку');
          break;
        }
        const elapsed = this.clock.now() - started;
        const rest = this.config.read().capture.intervalMs - elapsed;
        if (rest > 0 && !this.stopped && n < maxTicks) await this.clock.sleep(rest);
      }
    } finally {
      this.running = false;
      Logger.info(`остановлен после ${this.ticks} тиков`);
    }
  }
}
