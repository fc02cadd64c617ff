import type { Clock } from '../core/Clock';
import type { MobType } from '../core/Mobs';

export interface KillEvent {
  killNumber: number;
  mobType: MobType | null;
  /** От первого удара до смерти цели. */
  killMs: number;
  /** От предыдущего убийства до первого удара. */
  searchMs: number;
  at: number;
}

export interface StatisticsSnapshot {
  kills: number;
  lastKillAt: number | null;
  uptimeMs: number;
  uptime: string;
  killsPerMinute: number;
  killsPerHour: number;
  avgKillMs: number;
  avgSearchMs: number;
}

type KillListener = (e: KillEvent) => void;

function formatDuration(ms: number): string {
  const total = Math.floor(ms / 1000);
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = total % 60;
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${pad(h)}:${pad(m)}:${pad(s)}`;
}

export class Statistics {
  private readonly startedAt: number;
  private kills = 0;
  private lastKillAt: number | null = null;
  private totalKillMs = 0;
  private totalSearchMs = 0;
  private readonly listeners: KillListener[] = [];

  constructor(private readonly clock: Clock) {
    this.startedAt = clock.now();
  }

  addKill(mobType: MobType | null, killMs: number, searchMs: number): KillEvent {
    this.kills++;
    this.lastKillAt = this.clock.now();
    this.totalKillMs += Math.max(0, killMs);
    this.totalSearchMs += Math.max(0, searchMs);
    const event: KillEvent = { killNumber: this.kills, mobType, killMs, searchMs, at: this.lastKillAt };
    for (const l of this.listeners) l(event);
    return event;
  }

  onKill(listener: KillListener): () => void {
    this.listeners.push(listener);
    return () => {
      const i = this.listeners.indexOf(listener);
      if (i >= 0) this.listeners.splice(i, 1);
    };
  }

  get killCount(): number {
    return this.kills;
  }

  snapshot(): StatisticsSnapshot {
    const uptimeMs = this.clock.now() - this.startedAt;
    const minutes = uptimeMs / 60_000;
    const kpm = minutes > 0 ? this.kills / minutes : 0;
    return {
      kills: this.kills,
      lastKillAt: this.lastKillAt,
      uptimeMs,
      uptime: formatDuration(uptimeMs),
      killsPerMinute: Math.round(kpm * 100) / 100,
      killsPerHour: Math.round(kpm * 60),
      avgKillMs: this.kills > 0 ? Math.round(this.totalKillMs / this.kills) : 0,
      avgSearchMs: this.kills > 0 ? Math.round(this.totalSearchMs / this.kills) : 0,
    };
  }
}
