import './testEnv';
import assert from 'node:assert/strict';
import { test } from 'node:test';
import { detectScriptLanguage, resolveLanguage } from '../src/services/language-resolver';

test('detectScriptLanguage picks the dominant script', () => {
  assert.equal(detectScriptLanguage('गेहूं की फसल में पीला रोग'), 'hi');
  assert.equal(detectScriptLanguage('வணக்கம்'), 'ta');
  assert.equal(detectScriptLanguage('ਕਣਕ ਦੀ ਫਸਲ'), 'pa');
});

test('detectScriptLanguage needs more than five characters of one script', () => {
  assert.equal(detectScriptLanguage(''), null);
  assert.equal(detectScriptLanguage('வணக்க'), null);
  assert.equal(detectScriptLanguage('hello farmer, how is the wheat?'), null);
});

test('detectScriptLanguage breaks ties by language order, not text order', () => {
  assert.equal(detectScriptLanguage('नमस्ते வணக்கம'), 'hi');
  assert.equal(detectScriptLanguage('வணக்கம नमस्ते'), 'hi');
});

test('resolveLanguage trusts a supported provider language', () => {
  assert.equal(resolveLanguage('ta', 'गेहूं की फसल में पीला रोग', 'hi'), 'ta');
  assert.equal(resolveLanguage('en', 'When should I sow mustard?', 'bn'), 'en');
});

test('resolveLanguage falls back to the phone hint for unsupported provider languages', () => {
  assert.equal(resolveLanguage('fr', 'வணக்கம்', 'kn'), 'kn');
  assert.equal(resolveLanguage('fr', 'வணக்கம்', null), 'hi');
});

test('resolveLanguage uses script, then hint, then default when the provider is unsure', () => {
  assert.equal(resolveLanguage('auto', 'வணக்கம்', 'hi'), 'ta');
  assert.equal(resolveLanguage('auto', 'how much urea per acre', 'gu'), 'gu');
  assert.equal(resolveLanguage('auto', 'how much urea per acre'), 'hi');
  assert.equal(resolveLanguage('auto', 'how much urea per acre', 'xx'), 'hi');
});

test('resolveLanguage attributes Devanagari to Hindi even for Marathi hints', () => {
  assert.equal(resolveLanguage('auto', 'मिट्टी की जांच', 'mr'), 'hi');
  assert.equal(resolveLanguage('auto', 'ok', 'mr'), 'mr');
});
