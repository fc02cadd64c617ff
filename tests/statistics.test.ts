import assert from 'assert';
import { KillEvent, Statistics } from '../src/farming/Statistics';
import { ManualClock } from './helpers';

export function runTests() {
  const clock = new ManualClock();
  const stats = new Statistics(clock);
  const events: KillEvent[] = [];
  const off = stats.onKill((e) => events.push(e));

  const empty = stats.snapshot();
  assert.strictEqual(empty.kills, 0);
  assert.strictEqual(empty.killsPerMinute, 0);
  assert.strictEqual(empty.avgKillMs, 0);

  clock.advance(30_000);
  stats.addKill('passive', 8000, 4000);
  clock.advance(30_000);
  stats.addKill('aggressive', 12000, 2000);

  const s = stats.snapshot();
  assert.strictEqual(s.kills, 2);
  assert.strictEqual(s.uptimeMs, 60_000);
  assert.strictEqual(s.uptime, '00:01:00');
  assert.strictEqual(s.killsPerMinute, 2);
  assert.strictEqual(s.killsPerHour, 120);
  assert.strictEqual(s.avgKillMs, 10000);
  assert.strictEqual(s.avgSearchMs, 3000);
  assert.strictEqual(s.lastKillAt, clock.now());

  assert.deepStrictEqual(events.map((e) => [e.killNumber, e.mobType]), [[1, 'passive'], [2, 'aggressive']]);
  off();
  stats.addKill(null, 0, 0);
  assert.strictEqual(events.length, 2, 'unsubscribed listener is not called');

  clock.advance(3_600_000);
  assert.strictEqual(stats.snapshot().uptime, '01:01:00');

  console.log('Statistics tests passed');
}
