import { createLogger } from '../../core/Logger';
import { FarmingContext, FarmingStateName, IState } from '../State';

const Logger = createLogger('AfterEnemyKill');

const PET_PICKUP_MS = 1500;
const PICKUP_MS = 1000;

export class AfterEnemyKillState implements IState {
  readonly name = 'AfterEnemyKill';

  async execute(ctx: FarmingContext): Promise<FarmingStateName> {
    const m = ctx.memory;
    const f = ctx.settings.farming;
    const now = ctx.clock.now();

    const attackStart = m.lastInitialAttackAt ?? now;
    const killMs = now - attackStart;
    const searchMs = attackStart - (m.lastKillAt ?? m.sessionStartedAt);
    const ev = ctx.stats.addKill(m.lastKilledType, killMs, searchMs);
    Logger.info(`kill #${ev.killNumber}: бой ${killMs} мс, поиск ${searchMs} мс`);
    m.lastKillAt = now;
    m.lastInitialAttackAt = null;
    m.currentTarget = null;

    // Подбор: питомец, иначе действие «поднять», иначе старые слоты подбора.
    if (f.pickupPetSlot !== null) {
      if (await ctx.slots.send(f.pickupPetSlot, f.slotCooldowns)) {
        m.petSummonedAt = ctx.clock.now();
        ctx.wait(PET_PICKUP_MS);
      }
    } else if (f.pickupMotionSlot !== null) {
      if (await ctx.slots.send(f.pickupMotionSlot, f.slotCooldowns)) ctx.wait(PICKUP_MS);
    } else if ((await ctx.slots.useFirstReady(f.pickupSlots, f.slotCooldowns)) !== null) {
      ctx.wait(PICKUP_MS);
    }
    return 'SearchingForEnemy';
  }
}
