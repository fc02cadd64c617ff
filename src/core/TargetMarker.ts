import type { ImageDataLike } from './Capture';
import { ColorSpec } from './Color';
import { Bounds, Point, center, distance, pointsToBounds } from './Geometry';
import { scanPixels } from './PixelScan';

export interface MarkerColor extends ColorSpec {
  name: string;
}

export interface TargetMarkerSettings {
  /** Цвета маркера в порядке приоритета. */
  colors: MarkerColor[];
  /** Маркер подтверждён, если совпавших пикселей строго больше. */
  minPixels: number;
}

export interface MarkerDetection {
  found: boolean;
  color: string | null;
  center: Point | null;
  /** Расстояние от центра экрана; Infinity, если маркера нет. */
  distance: number;
  pixels: number;
}

export const NO_MARKER: MarkerDetection = {
  found: false,
  color: null,
  center: null,
  distance: Number.POSITIVE_INFINITY,
  pixels: 0,
};

/** Центральная зона экрана, где рисуется маркер выбранной цели. */
export function markerRegion(img: ImageDataLike): Bounds {
  return {
    x: Math.floor(img.width / 4),
    y: Math.floor(img.height / 6),
    width: Math.floor(img.width / 2),
    height: Math.floor(img.height / 3),
  };
}

export function screenCenter(img: ImageDataLike): Point {
  return { x: Math.floor(img.width / 2), y: Math.floor(img.height / 2) };
}

/**
 * Ищет маркер выбранной цели: цвета пробуются по очереди, побеждает первый набравший больше minPixels.
 */
export function detectTargetMarker(img: ImageDataLike, cfg: TargetMarkerSettings): MarkerDetection {
  const region = markerRegion(img);
  for (const mc of cfg.colors) {
    const points = scanPixels(img, region, [mc.color], mc.tolerance);
    if (points.length <= cfg.minPixels) continue;
    const bounds = pointsToBounds(points);
    if (!bounds) continue;
    const c = center(bounds);
    return { found: true, color: mc.name, center: c, distance: distance(c, screenCenter(img)), pixels: points.length };
  }
  return NO_MARKER;
}
