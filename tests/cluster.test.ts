import assert from 'assert';
import { clusterPoints } from '../src/core/Cluster';
import { Point } from '../src/core/Geometry';

function shuffled<T>(items: T[], seed: number): T[] {
  const out = [...items];
  let s = seed;
  for (let i = out.length - 1; i > 0; i--) {
    s = (s * 1103515245 + 12345) % 2147483648;
    const j = s % (i + 1);
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}

export function runTests() {
  assert.deepStrictEqual(clusterPoints([], 5, 5), []);

  // одна точка: нулевые размеры
  assert.deepStrictEqual(clusterPoints([{ x: 3, y: 4 }], 5, 5), [{ x: 3, y: 4, width: 0, height: 0 }]);

  // две подписи, разнесённые по X больше порога
  const points: Point[] = [];
  for (let x = 10; x <= 30; x++) points.push({ x, y: 50 }, { x, y: 52 });
  for (let x = 100; x <= 120; x++) points.push({ x, y: 60 });
  const clusters = clusterPoints(points, 50, 3);
  assert.deepStrictEqual(clusters, [
    { x: 10, y: 50, width: 20, height: 2 },
    { x: 100, y: 60, width: 20, height: 0 },
  ]);

  // разрыв, равный порогу, объединяет, больший разделяет
  assert.strictEqual(clusterPoints([{ x: 0, y: 0 }, { x: 5, y: 0 }], 5, 5).length, 1);
  assert.strictEqual(clusterPoints([{ x: 0, y: 0 }, { x: 6, y: 0 }], 5, 5).length, 2);

  // одна полоса по X, разделение по Y
  const stacked = clusterPoints([{ x: 0, y: 0 }, { x: 2, y: 1 }, { x: 1, y: 10 }], 5, 3);
  assert.deepStrictEqual(stacked, [
    { x: 0, y: 0, width: 2, height: 1 },
    { x: 1, y: 10, width: 0, height: 0 },
  ]);

  // независимость от порядка и детерминированность
  for (const seed of [1, 7, 42]) {
    assert.deepStrictEqual(clusterPoints(shuffled(points, seed), 50, 3), clusters, `shuffled seed=${seed}`);
  }
  assert.deepStrictEqual(clusterPoints(points, 50, 3), clusterPoints(points, 50, 3));

  // идемпотентность: кластеризация углов кластеров даёт те же кластеры
  const corners = clusters.flatMap((b) => [{ x: b.x, y: b.y }, { x: b.x + b.width, y: b.y + b.height }]);
  assert.deepStrictEqual(clusterPoints(corners, 50, 3), clusters);

  // вход не изменяется
  const input = [{ x: 5, y: 0 }, { x: 1, y: 0 }];
  clusterPoints(input, 1, 1);
  assert.deepStrictEqual(input, [{ x: 5, y: 0 }, { x: 1, y: 0 }]);

  console.log('Cluster tests passed');
}
