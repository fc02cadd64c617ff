import { distance, grow } from '../core/Geometry';
import { createLogger } from '../core/Logger';
import type { FarmingContext } from './State';

const Logger = createLogger('Engagement');

export type AbortReason = 'obstacle' | 'aoe';

/** Зона 2x2 вокруг последнего клика: туда не кликаем clickZoneMs. */
export function avoidLastClick(ctx: FarmingContext): void {
  const p = ctx.memory.lastClickPos;
  if (!p) return;
  ctx.avoidance.add({ x: p.x - 1, y: p.y - 1, width: 2, height: 2 }, ctx.settings.farming.avoidance.clickZoneMs);
}

/**
 * Новый клик далеко от прошлой неудачи, и счётчик неудач в одном месте сбрасывается.
 */
export function beginEngagement(ctx: FarmingContext): void {
  const m = ctx.memory;
  const click = m.lastClickPos;
  if (m.lastFailurePos && click && distance(m.lastFailurePos, click) > ctx.settings.farming.avoidance.sameSpotRadius) {
    m.attackAttempts = 0;
    m.lastFailurePos = null;
  }
}

/**
 * Бросает текущую цель.
 * obstacle: зона вокруг маркера растёт с каждой неудачей в том же месте; aoe: зона вокруг клика, неудачей не считается.
 */
export async function abortAttack(ctx: FarmingContext, reason: AbortReason): Promise<void> {
  const m = ctx.memory;
  const av = ctx.settings.farming.avoidance;
  const marker = ctx.view.target.marker;
  if (reason === 'obstacle' && marker) {
    const half = Math.floor(av.markerZoneSize / 2);
    const zone = grow(
      { x: marker.x - half, y: marker.y - half, width: av.markerZoneSize, height: av.markerZoneSize },
      m.attackAttempts * av.growStep,
    );
    ctx.avoidance.add(zone, av.markerZoneMs);
  } else {
    avoidLastClick(ctx);
  }
  if (reason === 'obstacle') {
    m.attackAttempts++;
    m.lastFailurePos = m.lastClickPos;
  }
  Logger.info(`цель брошена (${reason}), неудач на месте: ${m.attackAttempts}`);
  m.isAttacking = false;
  m.obstacleAttempts = 0;
  m.currentTarget = null;
  await ctx.movement.cancelTarget();
}
