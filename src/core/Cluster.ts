import { Bounds, Point, pointsToBounds } from './Geometry';

// Разбивает отсортированный список там, где разрыв по координате больше порога.
function splitByGap(points: Point[], coord: (p: Point) => number, maxGap: number): Point[][] {
  const groups: Point[][] = [];
  let current: Point[] = [];
  for (const p of points) {
    const last = current[current.length - 1];
    if (last && coord(p) - coord(last) > maxGap) {
      groups.push(current);
      current = [];
    }
    current.push(p);
  }
  if (current.length > 0) groups.push(current);
  return groups;
}

/**
 * Двухпроходная кластеризация: сначала полосы по X (разрыв > distanceX режет),
 * затем внутри каждой полосы по Y (разрыв > distanceY режет).
 * Каждая группа превращается в оболочку. Результат не зависит от порядка входных точек.
 */
export function clusterPoints(points: readonly Point[], distanceX: number, distanceY: number): Bounds[] {
  if (points.length === 0) return [];
  const byX = [...points].sort((a, b) => a.x - b.x || a.y - b.y);
  const out: Bounds[] = [];
  for (const column of splitByGap(byX, (p) => p.x, distanceX)) {
    const byY = column.sort((a, b) => a.y - b.y || a.x - b.x);
    for (const group of splitByGap(byY, (p) => p.y, distanceY)) {
      const b = pointsToBounds(group);
      if (b) out.push(b);
    }
  }
  return out;
}
