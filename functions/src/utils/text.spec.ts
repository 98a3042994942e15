import assert from 'node:assert/strict';
import test from 'node:test';
import { cleanText, decodeEntities, equalsIgnoreCase, stripHtml } from './text';

test('text helpers', async t => {
  await t.test('decodes named and numeric entities', () => {
    assert.equal(decodeEntities('Tom &amp; Jerry &#8211; &#x41;&quot;'), 'Tom & Jerry – A"');
  });

  await t.test('flattens markup onto one line', () => {
    assert.equal(stripHtml('<p>Line one<br/>Line two</p>\n<script>alert(1)</script>'), 'Line one Line two');
  });

  await t.test('returns null for non-text or empty values', () => {
    assert.equal(cleanText(42), null);
    assert.equal(cleanText('<p> </p>'), null);
  });

  await t.test('compares trimmed values without case', () => {
    assert.equal(equalsIgnoreCase(' London ', 'london'), true);
    assert.equal(equalsIgnoreCase(null, 'london'), false);
  });
});
