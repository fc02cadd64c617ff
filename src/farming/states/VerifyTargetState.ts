import { createLogger } from '../../core/Logger';
import { avoidLastClick } from '../Engagement';
import { FarmingContext, FarmingStateName, IState } from '../State';

const Logger = createLogger('VerifyTarget');

/**
 * Клик попал, если маркер выбора виден и у цели есть HP.
 * При промахе точку клика на время исключаем из поиска.
 */
export class VerifyTargetState implements IState {
  readonly name = 'VerifyTarget';

  async execute(ctx: FarmingContext): Promise<FarmingStateName> {
    const t = ctx.view.target;
    if (t.onScreen && t.alive) return 'Attacking';
    Logger.info(`цель не подтверждена (маркер=${t.onScreen}, жива=${t.alive})`);
    avoidLastClick(ctx);
    ctx.memory.currentTarget = null;
    return 'SearchingForEnemy';
  }
}
