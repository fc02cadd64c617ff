/** Точка в пикселях экрана. */
export interface Point {
  x: number;
  y: number;
}

/** Прямоугольник в пикселях: левый верхний угол и размеры. */
export interface Bounds {
  x: number;
  y: number;
  width: number;
  height: number;
}

export function distance(a: Point, b: Point): number {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return Math.sqrt(dx * dx + dy * dy);
}

export function center(b: Bounds): Point {
  return { x: b.x + Math.floor(b.width / 2), y: b.y + Math.floor(b.height / 2) };
}

/** Середина нижней кромки: сюда кликаем, чтобы попасть по модели под именем. */
export function bottomCenter(b: Bounds): Point {
  return { x: b.x + Math.floor(b.width / 2), y: b.y + b.height };
}

export function area(b: Bounds): number {
  return b.width * b.height;
}

/** Включительная проверка: точки на границе считаются внутри. */
export function containsPoint(b: Bounds, p: Point): boolean {
  return p.x >= b.x && p.x <= b.x + b.width && p.y >= b.y && p.y <= b.y + b.height;
}

/**
 * Симметрично расширяет прямоугольник: половина прироста уходит влево/вверх.
 * @param amount Прирост ширины и высоты
 */
export function grow(b: Bounds, amount: number): Bounds {
  const half = Math.floor(amount / 2);
  return { x: b.x - half, y: b.y - half, width: b.width + amount, height: b.height + amount };
}

/** Пересечение по открытым интервалам: касание краями не считается. */
export function overlaps(a: Bounds, b: Bounds): boolean {
  return a.x < b.x + b.width && a.x + a.width > b.x && a.y < b.y + b.height && a.y + a.height > b.y;
}

/** Оболочка множества точек. Ширина = maxX - minX (без +1). */
export function pointsToBounds(points: readonly Point[]): Bounds | null {
  if (points.length === 0) return null;
  let minX = points[0].x, maxX = points[0].x;
  let minY = points[0].y, maxY = points[0].y;
  for (const p of points) {
    if (p.x < minX) minX = p.x;
    if (p.x > maxX) maxX = p.x;
    if (p.y < minY) minY = p.y;
    if (p.y > maxY) maxY = p.y;
  }
  return { x: minX, y: minY, width: maxX - minX, height: maxY - minY };
}

/**
 * Отрицательные координаты региона отсчитываются от правого/нижнего края кадра.
 * Ширина/высота <= 0 растягивают регион до края.
 */
export function resolveRegion(region: Bounds, frameWidth: number, frameHeight: number): Bounds {
  const x = region.x < 0 ? frameWidth + region.x : region.x;
  const y = region.y < 0 ? frameHeight + region.y : region.y;
  const width = region.width > 0 ? region.width : frameWidth - x;
  const height = region.height > 0 ? region.height : frameHeight - y;
  return { x, y, width, height };
}

/** Пересечение региона с кадром; null, если регион целиком снаружи. */
export function clipToFrame(region: Bounds, frameWidth: number, frameHeight: number): Bounds | null {
  const x0 = Math.max(0, region.x);
  const y0 = Math.max(0, region.y);
  const x1 = Math.min(frameWidth, region.x + region.width);
  const y1 = Math.min(frameHeight, region.y + region.height);
  if (x1 <= x0 || y1 <= y0) return null;
  return { x: x0, y: y0, width: x1 - x0, height: y1 - y0 };
}
