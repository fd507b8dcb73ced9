import './testEnv';
import assert from 'node:assert/strict';
import { test } from 'node:test';
import { EXIT_DIGIT, exitKeywords, isExitIntent } from '../src/services/exit-intent';

test('the exit digit ends the call in any language', () => {
  assert.equal(isExitIntent({ digits: EXIT_DIGIT }, 'ta'), true);
  assert.equal(isExitIntent({ digits: '1' }, 'ta'), false);
  assert.equal(isExitIntent({ digits: '', speech: '' }, 'hi'), false);
});

test('exit phrases match in the call language', () => {
  assert.equal(isExitIntent({ speech: 'धन्यवाद' }, 'hi'), true);
  assert.equal(isExitIntent({ speech: 'बहुत बहुत शुक्रिया जी' }, 'hi'), true);
  assert.equal(isExitIntent({ speech: 'நன்றி' }, 'ta'), true);
  assert.equal(isExitIntent({ speech: 'OK, Thank You.' }, 'en'), true);
});

test('English exit phrases work on non-English calls', () => {
  assert.equal(isExitIntent({ speech: 'ok bye' }, 'kn'), true);
  assert.equal(isExitIntent({ speech: 'நன்றி' }, 'hi'), false);
});

test('exit phrases only match whole words', () => {
  assert.equal(isExitIntent({ speech: 'what do the byelaws say about water' }, 'en'), false);
  assert.equal(isExitIntent({ speech: 'धन्यवादों' }, 'hi'), false);
  assert.equal(isExitIntent({ speech: 'how do I control stem borer in rice' }, 'en'), false);
});

test('exitKeywords exposes the phrase list for recognizer hints', () => {
  assert.ok(exitKeywords('en').includes('goodbye'));
  assert.ok(exitKeywords('hi').includes('अलविदा'));
});
