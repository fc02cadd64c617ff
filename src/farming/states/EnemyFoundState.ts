import { attackPoint } from '../../core/Mobs';
import { beginEngagement } from '../Engagement';
import { FarmingContext, FarmingStateName, IState } from '../State';

export class EnemyFoundState implements IState {
  readonly name = 'EnemyFound';

  async execute(ctx: FarmingContext): Promise<FarmingStateName> {
    const m = ctx.memory;
    if (!m.currentTarget) return 'SearchingForEnemy';
    const p = attackPoint(m.currentTarget);
    await ctx.movement.clickTarget(p);
    m.lastClickPos = p;
    beginEngagement(ctx);
    // даём клиенту отрисовать маркер выбора
    await ctx.clock.sleep(ctx.settings.farming.verifyDelayMs);
    return 'VerifyTarget';
  }
}
