import { createLogger } from '../../core/Logger';
import { FarmingContext, FarmingStateName, IState } from '../State';

const Logger = createLogger('NoEnemyFound');

/**
 * Мобов не видно: сначала крутим камеру, исчерпав повороты, переходим на новое место по дуге.
 */
export class NoEnemyFoundState implements IState {
  readonly name = 'NoEnemyFound';

  async execute(ctx: FarmingContext): Promise<FarmingStateName> {
    const m = ctx.memory;
    const f = ctx.settings.farming;
    const now = ctx.clock.now();

    if (m.noEnemySince === null) m.noEnemySince = now;
    if (f.mobsTimeoutMs > 0 && now - m.noEnemySince > f.mobsTimeoutMs) {
      if (!m.stopRequested) Logger.error(`мобов нет уже ${now - m.noEnemySince} мс, остановка`);
      m.stopRequested = true;
      return this.name;
    }

    if (m.rotationAttempts < f.maxRotations) {
      await ctx.movement.rotateRight(50);
      await ctx.clock.sleep(50);
      m.rotationAttempts++;
      return 'SearchingForEnemy';
    }
    if (f.circleMoveDurationMs > 0) {
      Logger.info(`поворотов ${m.rotationAttempts}, ищем новое место`);
      await ctx.movement.circleMove(f.circleMoveDurationMs);
      return 'SearchingForEnemy';
    }
    m.rotationAttempts = 0;
    return this.name;
  }
}
