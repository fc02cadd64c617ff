import assert from 'assert';
import type { FrameSource } from '../src/core/Capture';
import { DEFAULT_SETTINGS, mergeSettings } from '../src/core/Config';
import { ConfigStore } from '../src/core/ConfigStore';
import { createRandom } from '../src/core/Random';
import { BotRunner } from '../src/farming/BotRunner';
import { FarmingBehavior } from '../src/farming/FarmingBehavior';
import { ManualClock, RecordingActuator, StubPerception, makeFrame } from './helpers';

export async function runTests() {
  const clock = new ManualClock();
  const behavior = new FarmingBehavior({
    perception: new StubPerception(),
    actuator: new RecordingActuator(),
    clock,
    random: createRandom(3),
  });
  const frames: FrameSource = { capture: async () => makeFrame(800, 600) };
  const store = new ConfigStore(mergeSettings(DEFAULT_SETTINGS, { farming: { mobsTimeoutMs: 1000 } }));
  const runner = new BotRunner(behavior, frames, store, clock);

  // мобов нет: поиск, поворот, поиск, таймаут на четвёртом тике
  await runner.start();
  assert.strictEqual(runner.tickCount, 4);
  assert.strictEqual(behavior.stopRequested, true);
  assert.strictEqual(runner.isRunning, false);

  // повторный старт начинает отсчёт заново
  await runner.start(2);
  assert.strictEqual(runner.tickCount, 6);
  assert.strictEqual(behavior.stopRequested, false);
  assert.strictEqual(behavior.memory.rotationAttempts, 2);

  // после последнего тика паузы нет: прошло только время поворота внутри тика
  const t0 = clock.now();
  await runner.start(1);
  assert.strictEqual(clock.now() - t0, 100);

  console.log('BotRunner tests passed');
}
