import { createLogger } from '../../core/Logger';
import { findClosestMob, prioritizeMobs } from '../../core/Mobs';
import { FarmingContext, FarmingStateName, IState } from '../State';

const Logger = createLogger('Searching');

export class SearchingForEnemyState implements IState {
  readonly name = 'SearchingForEnemy';

  async execute(ctx: FarmingContext): Promise<FarmingStateName> {
    const m = ctx.memory;
    const f = ctx.settings.farming;

    // Ручной режим: цель выбирает игрок, сразу проверяем её.
    if (f.manualTargetOnly) return 'VerifyTarget';

    const mobs = ctx.perception.findMobs(ctx.frame, ctx.settings.detection);
    m.detectedTargets = mobs;
    if (mobs.length === 0) return 'NoEnemyFound';

    const now = ctx.clock.now();
    const candidates = prioritizeMobs(mobs, {
      prioritizeAggro: f.prioritizeAggro,
      playerHp: ctx.view.bars.hp.percentage,
      minHpAttack: f.minHpAttack,
      lastKilledType: m.lastKilledType,
      msSinceLastKill: m.lastKillAt === null ? null : now - m.lastKillAt,
      aggroGraceMs: f.aggroGraceMs,
    });
    if (candidates.length === 0) return 'NoEnemyFound';

    m.rotationAttempts = 0;
    const target = findClosestMob(candidates, ctx.view.screenCenter, f.maxEngageDistance, (p) =>
      ctx.avoidance.isPointAvoided(p),
    );
    if (!target) {
      Logger.debug(`кандидатов ${candidates.length}, но все далеко или в зонах избегания`);
      return this.name;
    }
    m.currentTarget = target;
    m.noEnemySince = null;
    Logger.info(`цель ${target.type} @(${target.bbox.x},${target.bbox.y}) ${target.bbox.width}x${target.bbox.height}`);
    return 'EnemyFound';
  }
}
