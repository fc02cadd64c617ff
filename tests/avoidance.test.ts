import assert from 'assert';
import { AvoidanceList } from '../src/core/Avoidance';
import { grow, overlaps } from '../src/core/Geometry';
import { ManualClock } from './helpers';

export function runTests() {
  const clock = new ManualClock();
  const list = new AvoidanceList(clock);
  list.add({ x: 99, y: 199, width: 2, height: 2 }, 5000);

  assert.strictEqual(list.isPointAvoided({ x: 100, y: 200 }), true, 'click point inside');
  assert.strictEqual(list.isPointAvoided({ x: 101, y: 201 }), true, 'far edge is inclusive');
  assert.strictEqual(list.isPointAvoided({ x: 102, y: 200 }), false);
  assert.strictEqual(list.isAvoided({ x: 100, y: 200, width: 10, height: 10 }), true);
  assert.strictEqual(list.isAvoided({ x: 101, y: 201, width: 10, height: 10 }), false, 'touching edges do not overlap');

  // проверка не расходует зону
  assert.strictEqual(list.isPointAvoided({ x: 100, y: 200 }), true);

  // ровно durationMs зона ещё жива, после истекает
  clock.advance(5000);
  assert.strictEqual(list.isPointAvoided({ x: 100, y: 200 }), true);
  assert.strictEqual(list.prune(), 0);
  clock.advance(1);
  assert.strictEqual(list.isPointAvoided({ x: 100, y: 200 }), false);
  assert.strictEqual(list.size, 1, 'expired areas stay until pruned');
  assert.strictEqual(list.prune(), 1);
  assert.strictEqual(list.size, 0);

  // зоны независимы
  list.add({ x: 0, y: 0, width: 10, height: 10 }, 1000);
  clock.advance(600);
  list.add({ x: 50, y: 50, width: 10, height: 10 }, 1000);
  clock.advance(600);
  assert.strictEqual(list.prune(), 1);
  assert.deepStrictEqual(list.list().map((a) => a.bounds.x), [50]);

  // геометрия зон избегания
  assert.deepStrictEqual(grow({ x: 80, y: 180, width: 40, height: 40 }, 20), { x: 70, y: 170, width: 60, height: 60 });
  assert.strictEqual(overlaps({ x: 0, y: 0, width: 10, height: 10 }, { x: 9, y: 9, width: 5, height: 5 }), true);

  console.log('Avoidance tests passed');
}
