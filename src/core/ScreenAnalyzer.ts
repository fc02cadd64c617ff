import type { ImageDataLike } from './Capture';
import type { Clock } from './Clock';
import type { DetectionSettings } from './Config';
import type { Point } from './Geometry';
import { Target, identifyMobs } from './Mobs';
import { STATUS_BAR_KINDS, StatusBarKind, StatusBarSnapshot, StatusBarTracker } from './StatusBar';
import { detectTargetMarker, screenCenter } from './TargetMarker';

/** Состояние персонажа по панели статуса. trayClosed: панель не видна, судить нельзя. */
export type AliveState = 'trayClosed' | 'alive' | 'dead';

export interface TargetInfo {
  /** Маркер выбранной цели виден. */
  onScreen: boolean;
  marker: Point | null;
  markerColor: string | null;
  distance: number;
  alive: boolean;
  /** HP 100% и без MP: обычно NPC. */
  npc: boolean;
  mover: boolean;
}

export interface PerceptionSnapshot {
  at: number;
  frameWidth: number;
  frameHeight: number;
  screenCenter: Point;
  bars: Record<StatusBarKind, StatusBarSnapshot>;
  trayOpen: boolean;
  alive: AliveState;
  /** Панель закрыта слишком долго, пора нажать T. */
  trayReopenDue: boolean;
  target: TargetInfo;
  /** Сколько мс HP цели не менялся. */
  targetHpStaleMs: number;
}

/** То, что машина состояний знает о кадре. */
export interface Perception {
  refresh(frame: ImageDataLike, cfg: DetectionSettings): PerceptionSnapshot;
  findMobs(frame: ImageDataLike, cfg: DetectionSettings): Target[];
  resetTargetStaleness(): void;
}

export class ScreenAnalyzer implements Perception {
  private readonly bars: Record<StatusBarKind, StatusBarTracker>;
  private trayMisses = 0;

  constructor(private readonly clock: Clock) {
    this.bars = {
      hp: new StatusBarTracker('hp', clock),
      mp: new StatusBarTracker('mp', clock),
      fp: new StatusBarTracker('fp', clock),
      targetHp: new StatusBarTracker('targetHp', clock),
      targetMp: new StatusBarTracker('targetMp', clock),
    };
  }

  refresh(frame: ImageDataLike, cfg: DetectionSettings): PerceptionSnapshot {
    for (const k of STATUS_BAR_KINDS) this.bars[k].update(frame, cfg.bars[k]);
    const { hp, mp, fp, targetHp, targetMp } = this.bars;

    const trayOpen = hp.isDetected || mp.isDetected || fp.isDetected;
    let trayReopenDue = false;
    if (trayOpen) {
      this.trayMisses = 0;
    } else if (++this.trayMisses >= cfg.trayReopenAfter) {
      this.trayMisses = 0;
      trayReopenDue = true;
    }
    let alive: AliveState = 'trayClosed';
    if (trayOpen) alive = hp.isDetected && hp.value > 0 ? 'alive' : 'dead';

    const marker = detectTargetMarker(frame, cfg.targetMarker);
    const targetMpValue = targetMp.isDetected ? targetMp.value : 0;
    const target: TargetInfo = {
      onScreen: marker.found,
      marker: marker.center,
      markerColor: marker.color,
      distance: marker.distance,
      alive: targetHp.isDetected && targetHp.value > 0,
      npc: targetHp.isDetected && targetHp.value === 100 && targetMpValue === 0,
      mover: targetMpValue > 0,
    };

    const bars = {
      hp: hp.snapshot(),
      mp: mp.snapshot(),
      fp: fp.snapshot(),
      targetHp: targetHp.snapshot(),
      targetMp: targetMp.snapshot(),
    };
    return {
      at: this.clock.now(),
      frameWidth: frame.width,
      frameHeight: frame.height,
      screenCenter: screenCenter(frame),
      bars,
      trayOpen,
      alive,
      trayReopenDue,
      target,
      targetHpStaleMs: targetHp.staleForMs(),
    };
  }

  findMobs(frame: ImageDataLike, cfg: DetectionSettings): Target[] {
    return identifyMobs(frame, cfg.mobs);
  }

  resetTargetStaleness(): void {
    this.bars.targetHp.resetStaleness();
  }
}
