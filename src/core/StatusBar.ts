import type { ImageDataLike } from './Capture';
import type { Clock } from './Clock';
import { Rgb } from './Color';
import { clusterPoints } from './Cluster';
import { Bounds, area, resolveRegion } from './Geometry';
import { scanPixels } from './PixelScan';

export type StatusBarKind = 'hp' | 'mp' | 'fp' | 'targetHp' | 'targetMp';

export const STATUS_BAR_KINDS: readonly StatusBarKind[] = ['hp', 'mp', 'fp', 'targetHp', 'targetMp'];

/** Где и как искать полосу одного показателя. */
export interface StatusBarSettings {
  /** Регион поиска; отрицательные x/y отсчитываются от правого/нижнего края. */
  region: Bounds;
  /** Оттенки заливки полосы (градиент рисуется несколькими цветами). */
  colors: Rgb[];
  tolerance: number;
  clusterDistanceX: number;
  clusterDistanceY: number;
  minWidth: number;
  maxWidth: number;
  minHeight: number;
  maxHeight: number;
}

export interface StatusBarSnapshot {
  kind: StatusBarKind;
  percentage: number;
  width: number;
  runningMaxWidth: number;
  detected: boolean;
  bounds: Bounds | null;
  lastMeasuredAt: number | null;
  lastChangedAt: number;
}

/**
 * Выбирает самый широкий кластер, прошедший фильтр размеров.
 * При равной ширине выигрывает больший по площади, затем первый.
 */
export function measureBar(img: ImageDataLike, cfg: StatusBarSettings): Bounds | null {
  const region = resolveRegion(cfg.region, img.width, img.height);
  const points = scanPixels(img, region, cfg.colors, cfg.tolerance);
  let best: Bounds | null = null;
  for (const b of clusterPoints(points, cfg.clusterDistanceX, cfg.clusterDistanceY)) {
    if (b.width < cfg.minWidth || b.width > cfg.maxWidth) continue;
    if (b.height < cfg.minHeight || b.height > cfg.maxHeight) continue;
    if (!best || b.width > best.width || (b.width === best.width && area(b) > area(best))) best = b;
  }
  return best;
}

/**
 * Самокалибрующаяся полоса, где 100% соответствует самой широкой полоса, виденная с момента создания.
 * До первого измерения процент равен 0.
 */
export class StatusBarTracker {
  private runningMaxWidth = 0;
  private width = 0;
  private percentage = 0;
  private detected = false;
  private bounds: Bounds | null = null;
  private lastMeasuredAt: number | null = null;
  private lastChangedAt: number;

  constructor(readonly kind: StatusBarKind, private readonly clock: Clock) {
    this.lastChangedAt = clock.now();
  }

  /**
   * Измеряет полосу на кадре.
   * @returns true, если процент или эталонная ширина изменились
   */
  update(img: ImageDataLike, cfg: StatusBarSettings): boolean {
    const found = measureBar(img, cfg);
    if (!found) {
      // Промах: процент сохраняется, но полоса помечается как невидимая.
      this.detected = false;
      this.bounds = null;
      return false;
    }
    const now = this.clock.now();
    const prevMax = this.runningMaxWidth;
    const prevPct = this.percentage;
    this.runningMaxWidth = Math.max(this.runningMaxWidth, found.width);
    this.width = found.width;
    this.percentage = this.runningMaxWidth > 0
      ? Math.min(100, Math.max(0, Math.round((found.width / this.runningMaxWidth) * 100)))
      : 0;
    this.detected = true;
    this.bounds = found;
    this.lastMeasuredAt = now;
    const changed = prevMax !== this.runningMaxWidth || prevPct !== this.percentage;
    if (changed) this.lastChangedAt = now;
    return changed;
  }

  get value(): number {
    return this.percentage;
  }

  get isDetected(): boolean {
    return this.detected;
  }

  /** Сколько мс процент не менялся. */
  staleForMs(): number {
    return this.clock.now() - this.lastChangedAt;
  }

  resetStaleness(): void {
    this.lastChangedAt = this.clock.now();
  }

  snapshot(): StatusBarSnapshot {
    return {
      kind: this.kind,
      percentage: this.percentage,
      width: this.width,
      runningMaxWidth: this.runningMaxWidth,
      detected: this.detected,
      bounds: this.bounds,
      lastMeasuredAt: this.lastMeasuredAt,
      lastChangedAt: this.lastChangedAt,
    };
  }
}
