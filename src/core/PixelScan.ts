import type { ImageDataLike } from './Capture';
import { Rgb, pixelMatches } from './Color';
import { Bounds, Point, clipToFrame, containsPoint } from './Geometry';

/**
 * Собирает все пиксели региона, совпадающие с любым из цветов, в порядке строк (сверху вниз, слева направо).
 * Регион обрезается по кадру; точки внутри exclude (включительно) пропускаются.
 */
export function scanPixels(
  img: ImageDataLike,
  region: Bounds,
  colors: readonly Rgb[],
  tol: number,
  exclude?: Bounds | null,
): Point[] {
  const out: Point[] = [];
  const clip = clipToFrame(region, img.width, img.height);
  if (!clip || colors.length === 0) return out;
  const { data, width } = img;
  for (let y = clip.y; y < clip.y + clip.height; y++) {
    for (let x = clip.x; x < clip.x + clip.width; x++) {
      if (exclude && containsPoint(exclude, { x, y })) continue;
      if (pixelMatches(data, (y * width + x) * 4, colors, tol)) out.push({ x, y });
    }
  }
  return out;
}
