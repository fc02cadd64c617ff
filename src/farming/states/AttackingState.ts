import { createLogger } from '../../core/Logger';
import { abortAttack } from '../Engagement';
import { FarmingContext, FarmingStateName, IState } from '../State';

const Logger = createLogger('Attacking');

// Цель с полным HP, которая не получает урон, скорее всего недосягаема: сдаёмся быстрее.
const FULL_HP_MAX_TRIES = 2;

export class AttackingState implements IState {
  readonly name = 'Attacking';

  async execute(ctx: FarmingContext): Promise<FarmingStateName> {
    const m = ctx.memory;
    const f = ctx.settings.farming;
    const t = ctx.view.target;

    if (!m.isAttacking) {
      m.isAttacking = true;
      m.obstacleAttempts = 0;
      m.lastInitialAttackAt = ctx.clock.now();
      ctx.perception.resetTargetStaleness();
      Logger.info(`атака, HP цели ${ctx.view.bars.targetHp.percentage}%`);
    }

    if (!t.onScreen || !t.alive) {
      if (ctx.view.alive !== 'alive') return 'SearchingForEnemy';
      m.killCount++;
      m.lastKilledType = m.currentTarget?.type ?? null;
      m.isAttacking = false;
      m.attackAttempts = 0;
      m.lastFailurePos = null;
      m.concurrentMobs = 0;
      Logger.info(`цель убита, всего ${m.killCount}`);
      return 'AfterEnemyKill';
    }

    if (ctx.view.targetHpStaleMs > f.obstacleAvoidanceCooldownMs) {
      const maxTries = ctx.view.bars.targetHp.percentage === 100 ? FULL_HP_MAX_TRIES : f.obstacleAvoidanceMaxTry;
      if (m.obstacleAttempts >= maxTries) {
        Logger.warn(`HP цели не меняется, попыток обхода ${m.obstacleAttempts}`);
        await abortAttack(ctx, 'obstacle');
        return 'SearchingForEnemy';
      }
      Logger.info(`HP цели не меняется ${ctx.view.targetHpStaleMs} мс, обход препятствия #${m.obstacleAttempts + 1}`);
      await ctx.movement.avoidObstacle(m.obstacleAttempts);
      ctx.perception.resetTargetStaleness();
      m.obstacleAttempts++;
    }

    await ctx.slots.useFirstReady(f.attackSlots, f.slotCooldowns);

    // Групповой фарм: подраненную цель оставляем и набираем следующую.
    if (f.maxAoeFarming > 1 && m.concurrentMobs < f.maxAoeFarming) {
      if (ctx.view.bars.targetHp.percentage < f.aoeTargetHp) {
        m.concurrentMobs++;
        await abortAttack(ctx, 'aoe');
        return 'SearchingForEnemy';
      }
      return this.name;
    }

    if (f.aoeAttackSlots.length > 0 && t.distance < f.aoeDistance) {
      await ctx.slots.useFirstReady(f.aoeAttackSlots, f.slotCooldowns);
    }
    return this.name;
  }
}
