import assert from 'node:assert/strict';
import test from 'node:test';
import { classifyTopic, compileRules, GENERAL_TOPIC } from './topicClassifier';

test('classifyTopic', async t => {
  await t.test('matches keywords regardless of case', () => {
    assert.equal(classifyTopic('New Machine Learning toolkit released'), 'AI');
    assert.equal(classifyTopic('Ransomware gang targets hospitals'), 'Security');
    assert.equal(classifyTopic('Kubernetes 2.0 ships'), 'Cloud');
  });

  await t.test('matches whole words only', () => {
    assert.equal(classifyTopic('Spokesperson said nothing new'), GENERAL_TOPIC);
    assert.equal(classifyTopic('The AI boom continues'), 'AI');
  });

  await t.test('lets the first topic in rule order win', () => {
    assert.equal(classifyTopic('AI startup raises seed round'), 'AI');
  });

  await t.test('falls back to General', () => {
    assert.equal(classifyTopic('Local bakery opens second shop'), GENERAL_TOPIC);
    assert.equal(classifyTopic(''), GENERAL_TOPIC);
  });

  await t.test('accepts custom rules', () => {
    const rules = compileRules([
      { topic: 'Space', keywords: ['rocket', 'orbit'] },
      { topic: 'Empty', keywords: ['  '] },
    ]);
    assert.equal(classifyTopic('Rocket reaches orbit', rules), 'Space');
    assert.equal(classifyTopic('Nothing here', rules), GENERAL_TOPIC);
  });
});
