import assert from 'assert';
import fs from 'fs';
import path from 'path';
import { DEFAULT_SETTINGS, loadSettings, mergeSettings, parseSettings, stripJsonComments } from '../src/core/Config';
import { ConfigStore } from '../src/core/ConfigStore';

async function testStore() {
  const store = new ConfigStore(DEFAULT_SETTINGS);
  // снимок заморожен, а общие дефолты нет
  assert.strictEqual(Object.isFrozen(store.read().farming.attackSlots), true);
  assert.strictEqual(Object.isFrozen(DEFAULT_SETTINGS.farming.attackSlots), false);
  assert.strictEqual(Object.isFrozen(DEFAULT_SETTINGS.farming.slotCooldowns), false);
  assert.strictEqual(Object.isFrozen(DEFAULT_SETTINGS.detection.bars.hp.colors), false);
  assert.strictEqual(Object.isFrozen(DEFAULT_SETTINGS.detection.bars.hp.region), false);
  assert.strictEqual(Object.isFrozen(DEFAULT_SETTINGS.detection.targetMarker.colors), false);
  assert.strictEqual(Object.isFrozen(DEFAULT_SETTINGS.detection.mobs.colors.passive.color), false);
  const seen: number[] = [];
  const off = store.onChange((s) => seen.push(s.farming.healThreshold));

  // обе записи применяются по очереди, вторая видит результат первой
  const a = store.update({ farming: { healThreshold: 40 } });
  const b = store.update({ farming: { mpThreshold: 20 } });
  await Promise.all([a, b]);
  const s = store.read();
  assert.strictEqual(s.farming.healThreshold, 40);
  assert.strictEqual(s.farming.mpThreshold, 20);
  assert.deepStrictEqual(seen, [40, 40]);

  assert.strictEqual(Object.isFrozen(s), true);
  assert.strictEqual(Object.isFrozen(s.farming.attackSlots), true);
  assert.throws(() => s.farming.attackSlots.push(9), TypeError);

  const before = store.read();
  off();
  await store.update({ logLevel: 'debug' });
  assert.deepStrictEqual(seen, [40, 40], 'unsubscribed listener is not called');
  assert.strictEqual(store.read().logLevel, 'debug');
  assert.strictEqual(before.logLevel, 'info', 'old snapshot is unchanged');
}

export async function runTests() {
  const stripped = stripJsonComments('{"a": 1, // note\n "b": "http://x/*y*/" /* block */}');
  assert.deepStrictEqual(JSON.parse(stripped), { a: 1, b: 'http://x/*y*/' });
  assert.strictEqual(stripJsonComments('{"q": "say \\"//hi\\""}'), '{"q": "say \\"//hi\\""}');

  const s = parseSettings(`{
    // проверка каждого поля по отдельности
    "logLevel": "loud",
    "capture": { "intervalMs": 2, "roi": { "x": 10, "y": 20, "width": 300, "height": 200 } },
    "detection": { "mobs": { "exclude": null }, "bars": { "hp": { "maxWidth": 180 } } },
    "farming": {
      "attackSlots": [1, 12, -3, 2],
      "healSlots": "1",
      "pickupPetSlot": -1,
      "pickupMotionSlot": 5,
      "slotCooldowns": { "4": 3000, "11": 5 },
      "healThreshold": 150,
      "mpThreshold": "abc",
      "maxAoeFarming": 0,
      "avoidance": { "clickZoneMs": 8000 }
    }
  }`);
  assert.strictEqual(s.logLevel, 'info');
  assert.strictEqual(s.capture.intervalMs, 10);
  assert.strictEqual(s.capture.timeoutMs, 3000);
  assert.deepStrictEqual(s.capture.roi, { x: 10, y: 20, width: 300, height: 200 });
  assert.strictEqual(s.detection.mobs.exclude, null);
  assert.strictEqual(s.detection.mobs.minNameWidth, 15);
  assert.strictEqual(s.detection.bars.hp.maxWidth, 180);
  assert.strictEqual(s.detection.bars.mp.maxWidth, 300);
  assert.deepStrictEqual(s.farming.attackSlots, [1, 2]);
  assert.deepStrictEqual(s.farming.healSlots, [1]);
  assert.strictEqual(s.farming.pickupPetSlot, null);
  assert.strictEqual(s.farming.pickupMotionSlot, 5);
  assert.deepStrictEqual(s.farming.slotCooldowns, [0, 0, 0, 0, 3000, 0, 0, 0, 0, 0]);
  assert.strictEqual(s.farming.healThreshold, 100);
  assert.strictEqual(s.farming.mpThreshold, 30);
  assert.strictEqual(s.farming.maxAoeFarming, 1);
  assert.strictEqual(s.farming.avoidance.clickZoneMs, 8000);
  assert.strictEqual(s.farming.avoidance.markerZoneMs, 2000);

  // массивная форма кулдаунов
  const arr = mergeSettings(DEFAULT_SETTINGS, { farming: { slotCooldowns: [100, -5, 'x', 300] } });
  assert.deepStrictEqual(arr.farming.slotCooldowns, [100, 0, 0, 300, 0, 0, 0, 0, 0, 0]);

  // не-объект ничего не меняет
  assert.deepStrictEqual(mergeSettings(DEFAULT_SETTINGS, 42), DEFAULT_SETTINGS);

  assert.throws(() => parseSettings('{ "logLevel": '), SyntaxError);
  assert.strictEqual(loadSettings(path.join(__dirname, 'no-such-settings.jsonc')), DEFAULT_SETTINGS);

  const sample = parseSettings(fs.readFileSync(path.join(__dirname, '..', 'settings.jsonc'), 'utf-8'));
  assert.deepStrictEqual(sample.farming.slotCooldowns, [0, 3000, 5000, 5000, 0, 0, 0, 0, 0, 0]);
  assert.strictEqual(sample.detection.targetMarker.colors[1].name, 'red');

  await testStore();
  console.log('Config tests passed');
}
