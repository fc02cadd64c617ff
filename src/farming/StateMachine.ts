import { createLogger, errorMessage } from '../core/Logger';
import { FarmingContext, FarmingStateName, INITIAL_STATE, IState, canTransition } from './State';

const Logger = createLogger('FSM');

export interface StepResult {
  from: FarmingStateName;
  to: FarmingStateName;
  /** false: шаг упал или запросил запрещённый переход. */
  ok: boolean;
}

/**
 * Машина состояний фарма: один вызов step(): один шаг текущего состояния.
 * Каждый переход сверяется с таблицей TRANSITIONS.
 */
export class StateMachine {
  private readonly states = new Map<FarmingStateName, IState>();
  private current: IState;
  private entered = false;

  constructor(states: readonly IState[], initial: FarmingStateName = INITIAL_STATE) {
    for (const s of states) this.states.set(s.name, s);
    this.current = this.get(initial);
  }

  private get(name: FarmingStateName): IState {
    const s = this.states.get(name);
    if (!s) throw new Error(`StateMachine: состояние ${name} не зарегистрировано`);
    return s;
  }

  get currentName(): FarmingStateName {
    return this.current.name;
  }

  /** Принудительно возвращает машину в начальное состояние (без exit/enter). */
  reset(name: FarmingStateName = INITIAL_STATE): void {
    this.current = this.get(name);
    this.entered = false;
  }

  async step(ctx: FarmingContext): Promise<StepResult> {
    const from = this.current.name;
    let next: FarmingStateName;
    try {
      if (!this.entered) {
        await this.current.enter?.(ctx);
        this.entered = true;
      }
      next = await this.current.execute(ctx);
    } catch (e) {
      Logger.error(`${from}: ${errorMessage(e)}`);
      return { from, to: from, ok: false };
    }

    let ok = true;
    if (!canTransition(from, next)) {
      Logger.error(`недопустимый переход ${from} -> ${next}, возврат в ${INITIAL_STATE}`);
      next = INITIAL_STATE;
      ok = false;
    }
    if (next !== from) {
      try {
        await this.current.exit?.(ctx);
        this.current = this.get(next);
        await this.current.enter?.(ctx);
        Logger.debug(`${from} -> ${next}`);
      } catch (e) {
        Logger.error(`переход ${from} -> ${next}: ${errorMessage(e)}`);
        ok = false;
      }
    }
    return { from, to: this.current.name, ok };
  }
}
