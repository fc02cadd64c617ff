import type { Clock } from './Clock';
import { Bounds, Point, containsPoint, overlaps } from './Geometry';

/** Участок экрана, куда временно не кликаем. Не изменяется после создания. */
export interface AvoidedArea {
  readonly bounds: Bounds;
  readonly createdAt: number;
  readonly durationMs: number;
}

/**
 * Список зон избегания с истечением по времени.
 * Проверка не расходует зону: она живёт до конца своего срока.
 */
export class AvoidanceList {
  private areas: AvoidedArea[] = [];

  constructor(private readonly clock: Clock) {}

  add(bounds: Bounds, durationMs: number): AvoidedArea {
    const area: AvoidedArea = { bounds: { ...bounds }, createdAt: this.clock.now(), durationMs };
    this.areas.push(area);
    return area;
  }

  private isLive(a: AvoidedArea, now: number): boolean {
    return now - a.createdAt <= a.durationMs;
  }

  isAvoided(bounds: Bounds): boolean {
    const now = this.clock.now();
    return this.areas.some((a) => this.isLive(a, now) && overlaps(a.bounds, bounds));
  }

  isPointAvoided(p: Point): boolean {
    const now = this.clock.now();
    return this.areas.some((a) => this.isLive(a, now) && containsPoint(a.bounds, p));
  }

  /** Удаляет истёкшие зоны; возвращает число удалённых. */
  prune(): number {
    const now = this.clock.now();
    const before = this.areas.length;
    this.areas = this.areas.filter((a) => this.isLive(a, now));
    return before - this.areas.length;
  }

  list(): readonly AvoidedArea[] {
    return this.areas;
  }

  get size(): number {
    return this.areas.length;
  }
}
