import assert from 'assert';
import { DEFAULT_SETTINGS } from '../src/core/Config';
import { detectTargetMarker, markerRegion } from '../src/core/TargetMarker';
import { fillRect, makeFrame } from './helpers';

const cfg = DEFAULT_SETTINGS.detection.targetMarker;
const BLUE: [number, number, number] = [131, 148, 205];
const RED: [number, number, number] = [246, 90, 106];

export function runTests() {
  const empty = makeFrame(800, 600);
  assert.deepStrictEqual(markerRegion(empty), { x: 200, y: 100, width: 400, height: 200 });
  const none = detectTargetMarker(empty, cfg);
  assert.strictEqual(none.found, false);
  assert.strictEqual(none.distance, Number.POSITIVE_INFINITY);

  // 25 синих пикселей -> найден
  const img = makeFrame(800, 600);
  fillRect(img, 400, 200, 5, 5, BLUE);
  const det = detectTargetMarker(img, cfg);
  assert.strictEqual(det.found, true);
  assert.strictEqual(det.color, 'blue');
  assert.strictEqual(det.pixels, 25);
  assert.deepStrictEqual(det.center, { x: 402, y: 202 });
  assert.strictEqual(det.distance, Math.sqrt(2 * 2 + 98 * 98));

  // ровно 20 пикселей недостаточно
  const few = makeFrame(800, 600);
  fillRect(few, 400, 200, 4, 5, BLUE);
  assert.strictEqual(detectTargetMarker(few, cfg).found, false);

  // красный, если нет синего; синий важнее красного
  const red = makeFrame(800, 600);
  fillRect(red, 300, 150, 5, 5, RED);
  assert.strictEqual(detectTargetMarker(red, cfg).color, 'red');
  fillRect(red, 450, 250, 5, 5, BLUE);
  assert.strictEqual(detectTargetMarker(red, cfg).color, 'blue');

  // вне центральной области
  const outside = makeFrame(800, 600);
  fillRect(outside, 50, 50, 6, 6, BLUE);
  assert.strictEqual(detectTargetMarker(outside, cfg).found, false);

  console.log('TargetMarker tests passed');
}
