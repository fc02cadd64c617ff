import type { ImageDataLike } from './Capture';
import { ColorSpec } from './Color';
import { clusterPoints } from './Cluster';
import { Bounds, Point, bottomCenter, center, distance } from './Geometry';
import { scanPixels } from './PixelScan';

/**
 * Класс моба по цвету подписи. Мобы violet («зарезервированный» цвет)
 * видны в отчёте, но никогда не атакуются.
 */
export type MobType = 'passive' | 'aggressive' | 'violet';

export const MOB_TYPES: readonly MobType[] = ['passive', 'aggressive', 'violet'];

/**
 * Цель, найденная по подписи над мобом.
 * bbox: оболочка пикселей имени.
 */
export interface Target {
  type: MobType;
  bbox: Bounds;
}

export interface MobDetectionSettings {
  colors: Record<MobType, ColorSpec>;
  clusterDistanceX: number;
  clusterDistanceY: number;
  /** Ширина подписи строго между min и max. */
  minNameWidth: number;
  maxNameWidth: number;
  /** Отступы области поиска от верхнего и нижнего края кадра. */
  marginTop: number;
  marginBottom: number;
  /** Подписи выше этой линии (интерфейс) отбрасываются. */
  minLabelY: number;
  /** Собственная панель персонажа, её пиксели не сканируются. */
  exclude: Bounds | null;
}

/** Точка клика: середина нижней кромки подписи. */
export function attackPoint(t: Target): Point {
  return bottomCenter(t.bbox);
}

export function searchRegion(img: ImageDataLike, cfg: MobDetectionSettings): Bounds {
  return {
    x: 0,
    y: cfg.marginTop,
    width: img.width,
    height: Math.max(0, img.height - cfg.marginBottom - cfg.marginTop),
  };
}

/**
 * Ищет подписи мобов каждого цвета независимо.
 * Возвращает все классы, включая violet.
 */
export function identifyMobs(img: ImageDataLike, cfg: MobDetectionSettings): Target[] {
  const region = searchRegion(img, cfg);
  const out: Target[] = [];
  for (const type of MOB_TYPES) {
    const spec = cfg.colors[type];
    const points = scanPixels(img, region, [spec.color], spec.tolerance, cfg.exclude);
    for (const bbox of clusterPoints(points, cfg.clusterDistanceX, cfg.clusterDistanceY)) {
      if (bbox.width <= cfg.minNameWidth || bbox.width >= cfg.maxNameWidth) continue;
      if (bbox.y < cfg.minLabelY) continue;
      out.push({ type, bbox });
    }
  }
  return out;
}

export interface PriorityInput {
  prioritizeAggro: boolean;
  playerHp: number;
  minHpAttack: number;
  lastKilledType: MobType | null;
  /** null: ещё никого не убили. */
  msSinceLastKill: number | null;
  aggroGraceMs: number;
}

/**
 * Оставляет только тех, кого сейчас стоит атаковать.
 * Пассивных предлагаем, только если агрессивных нет (или остался последний из пачки,
 * которую мы только что били) и здоровья хватает; иначе агрессивных.
 */
export function prioritizeMobs(mobs: readonly Target[], p: PriorityInput): Target[] {
  const passive = mobs.filter((m) => m.type === 'passive');
  const aggressive = mobs.filter((m) => m.type === 'aggressive');
  if (!p.prioritizeAggro) return [...passive, ...aggressive];

  const lastOfPack =
    p.lastKilledType === 'aggressive' &&
    aggressive.length === 1 &&
    p.msSinceLastKill !== null &&
    p.msSinceLastKill < p.aggroGraceMs;
  if ((aggressive.length === 0 || lastOfPack) && p.playerHp >= p.minHpAttack) return passive;
  return aggressive;
}

/**
 * Ближайший к центру экрана моб в радиусе maxDistance, чья точка клика не в зоне избегания.
 */
export function findClosestMob(
  mobs: readonly Target[],
  screenCenter: Point,
  maxDistance: number,
  isAvoided: (p: Point) => boolean,
): Target | null {
  let best: Target | null = null;
  let bestDist = Number.POSITIVE_INFINITY;
  for (const m of mobs) {
    if (m.type === 'violet') continue;
    const d = distance(center(m.bbox), screenCenter);
    if (d > maxDistance || d >= bestDist) continue;
    if (isAvoided(attackPoint(m))) continue;
    best = m;
    bestDist = d;
  }
  return best;
}
