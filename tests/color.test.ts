import assert from 'assert';
import { MIN_ALPHA, isRgb, pixelMatches, withinTol } from '../src/core/Color';

export function runTests() {
  // withinTol
  assert.strictEqual(withinTol([255, 0, 0], [255, 0, 0], 0), true, 'exact red matches');
  assert.strictEqual(withinTol([250, 5, 5], [255, 0, 0], 6), true, 'near red within tol');
  assert.strictEqual(withinTol([240, 15, 15], [255, 0, 0], 6), false, 'farther than tol');
  assert.strictEqual(withinTol([229, 239, 149], [234, 234, 149], 5), true, 'delta equal to tol is accepted');
  assert.strictEqual(withinTol([228, 234, 149], [234, 234, 149], 5), false, 'delta tol+1 is rejected');

  // симметрия
  const pairs: Array<[[number, number, number], [number, number, number]]> = [
    [[10, 20, 30], [14, 17, 30]],
    [[179, 23, 23], [185, 23, 20]],
  ];
  for (const [a, b] of pairs) {
    for (const tol of [0, 3, 5, 6]) {
      assert.strictEqual(withinTol(a, b, tol), withinTol(b, a, tol), `symmetric for tol=${tol}`);
    }
  }

  // pixelMatches: порог по альфе
  const data = new Uint8ClampedArray([179, 23, 23, 255, 179, 23, 23, MIN_ALPHA - 1, 179, 23, 23, MIN_ALPHA]);
  assert.strictEqual(pixelMatches(data, 0, [[179, 23, 23]], 0), true, 'opaque pixel matches');
  assert.strictEqual(pixelMatches(data, 4, [[179, 23, 23]], 0), false, 'alpha below 250 never matches');
  assert.strictEqual(pixelMatches(data, 8, [[179, 23, 23]], 0), true, 'alpha 250 matches');
  assert.strictEqual(pixelMatches(data, 0, [[0, 0, 0], [180, 22, 24]], 1), true, 'any color in list');
  assert.strictEqual(pixelMatches(data, 0, [], 255), false, 'empty color list');

  // isRgb
  assert.strictEqual(isRgb([1, 2, 3]), true);
  assert.strictEqual(isRgb([1, 2]), false);
  assert.strictEqual(isRgb([1, 2, 256]), false);
  assert.strictEqual(isRgb('red'), false);

  console.log('Color tests passed');
}
