import type { Actuator } from '../core/Actions';
import type { Clock } from '../core/Clock';
import type { Point } from '../core/Geometry';
import type { Random } from '../core/Random';

/**
 * Переводит игровые манёвры в нажатия клавиш.
 * Длительности удержаний слегка варьируются через Random, чтобы движения не повторялись точь-в-точь.
 */
export class MovementCoordinator {
  constructor(
    private readonly actuator: Actuator,
    private readonly clock: Clock,
    private readonly random: Random,
  ) {}

  pressKey(key: string): Promise<void> {
    return this.actuator.pressKey(key);
  }

  async holdKeys(keys: readonly string[]): Promise<void> {
    for (const k of keys) await this.actuator.holdKey(k);
  }

  async releaseKeys(keys: readonly string[]): Promise<void> {
    for (const k of keys) await this.actuator.releaseKey(k);
  }

  async holdFor(keys: readonly string[], ms: number): Promise<void> {
    await this.holdKeys(keys);
    await this.clock.sleep(ms);
    await this.releaseKeys([...keys].reverse());
  }

  private jitter(ms: number, spread: number): number {
    return ms + this.random.int(0, spread);
  }

  rotateRight(ms: number): Promise<void> {
    return this.holdFor(['right'], ms);
  }

  /** Дуга вперёд-вправо с прыжком и короткий шаг назад для сброса инерции. */
  async circleMove(rotateMs: number): Promise<void> {
    await this.holdKeys(['w', 'space', 'd']);
    await this.clock.sleep(this.jitter(rotateMs, 20));
    await this.actuator.releaseKey('d');
    await this.clock.sleep(20);
    await this.releaseKeys(['space', 'w']);
    await this.holdFor(['s'], 50);
  }

  /**
   * Манёвр обхода препятствия.
   * Первая попытка: захват цели + рывок вперёд с прыжком; далее рывок со стрейфом, сторона чередуется.
   */
  async avoidObstacle(attempt: number): Promise<void> {
    if (attempt === 0) {
      await this.lockTarget();
      await this.holdFor(['w', 'space'], this.jitter(800, 100));
      return;
    }
    const strafe = attempt % 2 === 1 ? 'a' : 'd';
    await this.holdKeys(['w', 'space']);
    await this.holdFor([strafe], this.jitter(200, 50));
    await this.clock.sleep(this.jitter(800, 100));
    await this.releaseKeys(['space', 'w']);
    await this.lockTarget();
  }

  clickTarget(p: Point): Promise<void> {
    return this.actuator.click(p);
  }

  useSlot(slot: number): Promise<void> {
    return this.actuator.useSlot(slot);
  }

  lockTarget(): Promise<void> {
    return this.actuator.pressKey('z');
  }

  cancelTarget(): Promise<void> {
    return this.actuator.pressKey('escape');
  }

  openStatusTray(): Promise<void> {
    return this.actuator.pressKey('t');
  }
}
