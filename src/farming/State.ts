import type { AvoidanceList } from '../core/Avoidance';
import type { ImageDataLike } from '../core/Capture';
import type { Clock } from '../core/Clock';
import type { BotSettings } from '../core/Config';
import type { Point } from '../core/Geometry';
import type { MobType, Target } from '../core/Mobs';
import type { Perception, PerceptionSnapshot } from '../core/ScreenAnalyzer';
import type { MovementCoordinator } from './Movement';
import type { SlotDispatcher } from './SlotDispatcher';
import type { Statistics } from './Statistics';

export type FarmingStateName =
  | 'NoEnemyFound'
  | 'SearchingForEnemy'
  | 'EnemyFound'
  | 'VerifyTarget'
  | 'Attacking'
  | 'AfterEnemyKill';

export const INITIAL_STATE: FarmingStateName = 'SearchingForEnemy';

/**
 * Разрешённые переходы. Переход в самого себя разрешён всегда.
 */
export const TRANSITIONS: Record<FarmingStateName, readonly FarmingStateName[]> = {
  NoEnemyFound: ['SearchingForEnemy'],
  SearchingForEnemy: ['NoEnemyFound', 'EnemyFound', 'VerifyTarget'],
  EnemyFound: ['VerifyTarget', 'SearchingForEnemy'],
  VerifyTarget: ['Attacking', 'SearchingForEnemy'],
  Attacking: ['AfterEnemyKill', 'SearchingForEnemy'],
  AfterEnemyKill: ['SearchingForEnemy'],
};

export function canTransition(from: FarmingStateName, to: FarmingStateName): boolean {
  return from === to || TRANSITIONS[from].includes(to);
}

/** Отложенная пауза: пока не истекла, тики не вызывают состояния. */
export interface PendingWait {
  startedAt: number;
  durationMs: number;
}

/**
 * Память фарма между тиками. Всё, что может отсутствовать, хранится как null.
 */
export interface FarmingMemory {
  currentTarget: Target | null;
  /** Все мобы последнего поиска, включая violet. */
  detectedTargets: Target[];
  lastClickPos: Point | null;
  /** Где последний раз пришлось бросить цель; рядом с этой точкой неудачи копятся. */
  lastFailurePos: Point | null;
  /** Сколько раз подряд бросали цель в одном и том же месте. */
  attackAttempts: number;
  obstacleAttempts: number;
  rotationAttempts: number;
  isAttacking: boolean;
  concurrentMobs: number;
  lastInitialAttackAt: number | null;
  lastKillAt: number | null;
  lastKilledType: MobType | null;
  /** Начало текущей серии тиков без мобов. */
  noEnemySince: number | null;
  petSummonedAt: number | null;
  killCount: number;
  pendingWait: PendingWait | null;
  sessionStartedAt: number;
  stopRequested: boolean;
}

export function createMemory(now: number): FarmingMemory {
  return {
    currentTarget: null,
    detectedTargets: [],
    lastClickPos: null,
    lastFailurePos: null,
    attackAttempts: 0,
    obstacleAttempts: 0,
    rotationAttempts: 0,
    isAttacking: false,
    concurrentMobs: 0,
    lastInitialAttackAt: null,
    lastKillAt: null,
    lastKilledType: null,
    noEnemySince: null,
    petSummonedAt: null,
    killCount: 0,
    pendingWait: null,
    sessionStartedAt: now,
    stopRequested: false,
  };
}

/**
 * Контекст машины состояний на один тик: снимок настроек, результат восприятия и сервисы.
 */
export interface FarmingContext {
  settings: BotSettings;
  frame: ImageDataLike;
  view: PerceptionSnapshot;
  perception: Perception;
  movement: MovementCoordinator;
  slots: SlotDispatcher;
  avoidance: AvoidanceList;
  stats: Statistics;
  clock: Clock;
  memory: FarmingMemory;
  /** Продлевает текущую паузу или начинает новую. */
  wait(ms: number): void;
}

/**
 * Базовый интерфейс состояния FSM.
 * Подготовка в `enter`, очистка в `exit`.
 */
export interface IState {
  readonly name: FarmingStateName;
  enter?(ctx: FarmingContext): Promise<void> | void;
  /**
   * Один шаг состояния.
   * @returns Имя следующего состояния (своё имя, чтобы остаться)
   */
  execute(ctx: FarmingContext): Promise<FarmingStateName>;
  exit?(ctx: FarmingContext): Promise<void> | void;
}
