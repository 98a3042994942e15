import assert from 'node:assert/strict';
import test from 'node:test';
import { ValidationError } from '../errors';
import { paginate } from './pagination';

const ITEMS = ['a', 'b', 'c', 'd', 'e'];

test('paginate', async t => {
  await t.test('returns the requested window with the unsliced total', () => {
    assert.deepEqual(paginate(ITEMS, 2, 1), { total: 5, limit: 2, offset: 1, items: ['b', 'c'] });
  });

  await t.test('returns a short final page', () => {
    assert.deepEqual(paginate(ITEMS, 10, 3).items, ['d', 'e']);
  });

  await t.test('returns no items when the offset is past the end', () => {
    assert.deepEqual(paginate(ITEMS, 2, 9), { total: 5, limit: 2, offset: 9, items: [] });
  });

  await t.test('allows a zero limit', () => {
    assert.deepEqual(paginate(ITEMS, 0, 0).items, []);
  });

  await t.test('rejects negative or fractional values', () => {
    assert.throws(() => paginate(ITEMS, -1, 0), ValidationError);
    assert.throws(() => paginate(ITEMS, 1, -1), ValidationError);
    assert.throws(() => paginate(ITEMS, 1.5, 0), ValidationError);
  });

  await t.test('stepping the offset by the limit rebuilds the list without gaps or repeats', () => {
    const numbers = Array.from({ length: 11 }, (_, index) => index);
    const joined: number[] = [];
    const offsets: number[] = [];
    for (let offset = 0; ; offset += 4) {
      const page = paginate(numbers, 4, offset);
      offsets.push(offset);
      assert.equal(page.total, 11);
      assert.ok(page.items.length <= 4);
      if (page.items.length === 0) {
        break;
      }
      joined.push(...page.items);
    }
    assert.deepEqual(offsets, [0, 4, 8, 12]);
    assert.deepEqual(joined, numbers);
  });
});
