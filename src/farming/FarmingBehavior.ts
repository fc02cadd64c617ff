import type { Actuator } from '../core/Actions';
import { AvoidanceList, AvoidedArea } from '../core/Avoidance';
import type { ImageDataLike } from '../core/Capture';
import type { Clock } from '../core/Clock';
import type { BotSettings } from '../core/Config';
import { createLogger, errorMessage } from '../core/Logger';
import type { Target } from '../core/Mobs';
import type { Random } from '../core/Random';
import type { Perception, PerceptionSnapshot } from '../core/ScreenAnalyzer';
import { MovementCoordinator } from './Movement';
import { SlotDispatcher } from './SlotDispatcher';
import { FarmingContext, FarmingMemory, FarmingStateName, createMemory } from './State';
import { StateMachine } from './StateMachine';
import { Statistics, StatisticsSnapshot } from './Statistics';
import { AfterEnemyKillState } from './states/AfterEnemyKillState';
import { AttackingState } from './states/AttackingState';
import { EnemyFoundState } from './states/EnemyFoundState';
import { NoEnemyFoundState } from './states/NoEnemyFoundState';
import { SearchingForEnemyState } from './states/SearchingForEnemyState';
import { VerifyTargetState } from './states/VerifyTargetState';

const Logger = createLogger('Farming');

const AOE_HEAL_REPEATS = 3;
const AOE_HEAL_GAP_MS = 100;
// Питомец-подборщик отзывается, если у его слота не задан кулдаун.
const DEFAULT_PET_UNSUMMON_MS = 3000;

export interface FarmingDeps {
  perception: Perception;
  actuator: Actuator;
  clock: Clock;
  random: Random;
}

export type TickOutcome = 'dispatched' | 'noFrame' | 'notAlive' | 'waiting' | 'buffing' | 'failed';

export interface TickResult {
  outcome: TickOutcome;
  state: FarmingStateName;
}

export interface FarmingSnapshot {
  state: FarmingStateName;
  view: PerceptionSnapshot | null;
  currentTarget: Target | null;
  detectedTargets: readonly Target[];
  avoidedAreas: readonly AvoidedArea[];
  killCount: number;
  stopRequested: boolean;
  statistics: StatisticsSnapshot;
}

/**
 * Поведение фарма: на каждый кадр обновляем восприятие, лечимся и баффаемся, затем делаем шаг FSM.
 */
export class FarmingBehavior {
  readonly memory: FarmingMemory;
  readonly avoidance: AvoidanceList;
  readonly stats: Statistics;
  readonly movement: MovementCoordinator;
  readonly slots: SlotDispatcher;
  private readonly machine: StateMachine;
  private view: PerceptionSnapshot | null = null;

  constructor(private readonly deps: FarmingDeps) {
    const { clock } = deps;
    this.memory = createMemory(clock.now());
    this.avoidance = new AvoidanceList(clock);
    this.stats = new Statistics(clock);
    this.movement = new MovementCoordinator(deps.actuator, clock, deps.random);
    this.slots = new SlotDispatcher(this.movement, clock);
    this.machine = new StateMachine([
      new NoEnemyFoundState(),
      new SearchingForEnemyState(),
      new EnemyFoundState(),
      new VerifyTargetState(),
      new AttackingState(),
      new AfterEnemyKillState(),
    ]);
  }

  get stateName(): FarmingStateName {
    return this.machine.currentName;
  }

  get stopRequested(): boolean {
    return this.memory.stopRequested;
  }

  /** Снимает запрос на остановку, оставшийся от прошлого запуска (таймаут без мобов). */
  resume(): void {
    this.memory.stopRequested = false;
    this.memory.noEnemySince = null;
  }

  wait(ms: number): void {
    const w = this.memory.pendingWait;
    if (w) w.durationMs += ms;
    else this.memory.pendingWait = { startedAt: this.deps.clock.now(), durationMs: ms };
  }

  /** true, пока пауза не истекла; истёкшая пауза снимается. */
  isWaiting(): boolean {
    const w = this.memory.pendingWait;
    if (!w) return false;
    if (this.deps.clock.now() - w.startedAt < w.durationMs) return true;
    this.memory.pendingWait = null;
    return false;
  }

  /**
   * Один тик. Исключения не выходят наружу: ошибка логируется, тик считается пустым.
   * @param frame Кадр или null, если захват не удался
   * @param settings Снимок настроек на этот тик
   */
  async tick(frame: ImageDataLike | null, settings: BotSettings): Promise<TickResult> {
    const result = (outcome: TickOutcome): TickResult => ({ outcome, state: this.machine.currentName });
    if (!frame) return result('noFrame');
    try {
      const view = this.deps.perception.refresh(frame, settings.detection);
      this.view = view;
      this.avoidance.prune();

      if (view.alive !== 'alive') {
        await this.handleNotAlive(view);
        return result('notAlive');
      }

      const ctx = this.context(frame, view, settings);
      await this.unsummonPet(ctx);
      await this.restore(ctx);
      if (this.isWaiting()) return result('waiting');
      if (await this.castBuffs(ctx)) return result('buffing');

      const step = await this.machine.step(ctx);
      return result(step.ok ? 'dispatched' : 'failed');
    } catch (e) {
      Logger.error(`тик прерван: ${errorMessage(e)}`);
      return result('failed');
    }
  }

  private context(frame: ImageDataLike, view: PerceptionSnapshot, settings: BotSettings): FarmingContext {
    return {
      settings,
      frame,
      view,
      perception: this.deps.perception,
      movement: this.movement,
      slots: this.slots,
      avoidance: this.avoidance,
      stats: this.stats,
      clock: this.deps.clock,
      memory: this.memory,
      wait: (ms) => this.wait(ms),
    };
  }

  private async handleNotAlive(view: PerceptionSnapshot): Promise<void> {
    if (view.alive === 'trayClosed') {
      if (view.trayReopenDue) {
        Logger.info('панель статуса не видна, открываем (T)');
        await this.movement.openStatusTray();
      }
      return;
    }
    // Смерть обрывает бой: после воскрешения начинаем с поиска.
    if (this.machine.currentName !== 'SearchingForEnemy') {
      Logger.warn(`персонаж мёртв (состояние ${this.machine.currentName}), сброс`);
      this.machine.reset();
    }
    this.memory.isAttacking = false;
    this.memory.currentTarget = null;
  }

  private async unsummonPet(ctx: FarmingContext): Promise<void> {
    const m = this.memory;
    const slot = ctx.settings.farming.pickupPetSlot;
    if (m.petSummonedAt === null || slot === null) return;
    const after = ctx.settings.farming.slotCooldowns[slot] || DEFAULT_PET_UNSUMMON_MS;
    if (ctx.clock.now() - m.petSummonedAt < after) return;
    if (await this.slots.send(slot, ctx.settings.farming.slotCooldowns)) {
      Logger.debug('питомец-подборщик отозван');
      m.petSummonedAt = null;
    }
  }

  /** Периодические умения кастуются только из слотов с положительным кулдауном. */
  private async castPeriodic(slots: readonly number[], cooldowns: readonly number[]): Promise<boolean> {
    let cast = false;
    for (const s of slots) {
      if ((cooldowns[s] ?? 0) <= 0) continue;
      if (await this.slots.send(s, cooldowns)) cast = true;
    }
    return cast;
  }

  private async restore(ctx: FarmingContext): Promise<void> {
    const f = ctx.settings.farming;
    const { hp, mp, fp } = ctx.view.bars;

    await this.castPeriodic(f.partySkillSlots, f.slotCooldowns);

    if (hp.detected && hp.percentage > 0 && hp.percentage < f.healThreshold) {
      const healed = await this.slots.useFirstReady(f.healSlots, f.slotCooldowns);
      const slot = healed === null ? await this.slots.useFirstReady(f.aoeHealSlots, f.slotCooldowns) : null;
      if (slot !== null) {
        // групповой хил серией
        for (let i = 1; i < AOE_HEAL_REPEATS; i++) {
          await ctx.clock.sleep(AOE_HEAL_GAP_MS);
          await this.movement.useSlot(slot);
        }
      }
    }
    if (mp.detected && mp.percentage < f.mpThreshold) {
      await this.slots.useFirstReady(f.mpRestoreSlots, f.slotCooldowns);
    }
    if (fp.detected && fp.percentage < f.fpThreshold) {
      await this.slots.useFirstReady(f.fpRestoreSlots, f.slotCooldowns);
    }
  }

  private async castBuffs(ctx: FarmingContext): Promise<boolean> {
    const f = ctx.settings.farming;
    if (!(await this.castPeriodic(f.buffSlots, f.slotCooldowns))) return false;
    this.wait(f.buffCastMs);
    return true;
  }

  snapshot(): FarmingSnapshot {
    return {
      state: this.machine.currentName,
      view: this.view,
      currentTarget: this.memory.currentTarget,
      detectedTargets: this.memory.detectedTargets,
      avoidedAreas: this.avoidance.list(),
      killCount: this.memory.killCount,
      stopRequested: this.memory.stopRequested,
      statistics: this.stats.snapshot(),
    };
  }
}
