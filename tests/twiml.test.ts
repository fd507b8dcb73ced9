import './testEnv';
import assert from 'node:assert/strict';
import { test } from 'node:test';
import { renderTwiml } from '../src/services/twiml';

const XML_DECL = '<?xml version="1.0" encoding="UTF-8"?>';

test('renders say, pause, redirect and hangup', () => {
  const xml = renderTwiml([
    { kind: 'say', text: 'Please hold.', language: 'en' },
    { kind: 'pause', lengthSec: 3 },
    { kind: 'redirect', url: 'https://helpline.test/twilio/poll' },
    { kind: 'hangup' },
  ]);

  assert.equal(
    xml,
    `${XML_DECL}<Response>` +
      '<Say voice="Polly.Aditi" language="en-IN">Please hold.</Say>' +
      '<Pause length="3"/>' +
      '<Redirect method="POST">https://helpline.test/twilio/poll</Redirect>' +
      '<Hangup/>' +
      '</Response>',
  );
});

test('languages without a carrier voice only set the language', () => {
  const xml = renderTwiml([{ kind: 'say', text: 'vanakkam', language: 'ta' }]);
  assert.equal(xml, `${XML_DECL}<Response><Say language="ta-IN">vanakkam</Say></Response>`);
});

test('renders a record that posts back to the recording webhook', () => {
  const xml = renderTwiml([
    { kind: 'record', maxLengthSec: 30, silenceTimeoutSec: 3, action: 'https://helpline.test/twilio/recording' },
  ]);

  assert.equal(
    xml,
    `${XML_DECL}<Response>` +
      '<Record action="https://helpline.test/twilio/recording" method="POST" maxLength="30" timeout="3" playBeep="true" trim="trim-silence"/>' +
      '</Response>',
  );
});

test('gather nests its prompts', () => {
  const xml = renderTwiml([
    {
      kind: 'gather',
      input: ['speech', 'dtmf'],
      timeoutSec: 5,
      action: 'https://helpline.test/twilio/gather',
      language: 'en',
      hints: ['bye', 'thank you'],
      bargeIn: true,
      prompts: [
        { kind: 'play', url: 'https://helpline.test/twilio/audio/CA1/1' },
        { kind: 'say', text: 'Another question?', language: 'en' },
      ],
    },
  ]);

  assert.ok(xml.startsWith(`${XML_DECL}<Response><Gather `));
  assert.ok(xml.includes('action="https://helpline.test/twilio/gather"'));
  assert.ok(xml.includes('hints="bye, thank you"'));
  assert.ok(
    xml.endsWith(
      '<Play>https://helpline.test/twilio/audio/CA1/1</Play>' +
        '<Say voice="Polly.Aditi" language="en-IN">Another question?</Say>' +
        '</Gather></Response>',
    ),
  );
});
