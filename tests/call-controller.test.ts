import './testEnv';
import assert from 'node:assert/strict';
import { test } from 'node:test';
import { prompt } from '../src/prompts';
import { CallController, CallPolicy } from '../src/services/call-controller';
import { CallRegistry } from '../src/services/call-registry';
import type { SessionLimits } from '../src/services/session';
import type { VoiceAction, VoiceScript } from '../src/types';
import { createFakePipeline } from './fakes';

const BASE = 'https://helpline.test';
const RECORDING = 'https://api.twilio.test/Recordings/RE1';
const QUESTION_HI = 'गेहूं की फसल में पीला रोग';
const FOLLOW_UP_HI = 'पानी कब दें';
const ANSWER = 'Spray neem oil in the evening.';
const DELHI_LANDLINE = '+91 11 2345 6789';

type SttResult = { text: string; language: string; confidence: number };

function setup(
  sttResults: SttResult[],
  options: { limits?: SessionLimits; policy?: Partial<CallPolicy>; qualityGate?: boolean } = {},
) {
  let now = Date.UTC(2024, 5, 1, 6, 0);
  const clock = () => now;
  const pipeline = createFakePipeline(sttResults, { qualityGate: options.qualityGate });
  const registry = new CallRegistry(options.limits, clock);
  const controller = new CallController({
    registry,
    processor: pipeline.processor,
    publicUrl: `${BASE}/`,
    policy: options.policy,
  });
  return {
    ...pipeline,
    registry,
    controller,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

function kinds(script: VoiceScript): string[] {
  return script.map((action) => action.kind);
}

function only<K extends VoiceAction['kind']>(script: VoiceScript, kind: K): Extract<VoiceAction, { kind: K }> {
  const matches = script.filter((action): action is Extract<VoiceAction, { kind: K }> => action.kind === kind);
  assert.equal(matches.length, 1, `expected exactly one ${kind}`);
  return matches[0];
}

const hindiCall = () => setup([{ text: QUESTION_HI, language: 'auto', confidence: 0.92 }]);

test('incoming call greets in the hinted language and starts recording', () => {
  const { controller, registry } = hindiCall();

  const script = controller.handleIncomingCall({ callSid: 'CA1', from: DELHI_LANDLINE });

  assert.deepEqual(script, [
    { kind: 'say', text: prompt('hi', 'greeting'), language: 'hi' },
    { kind: 'record', maxLengthSec: 30, silenceTimeoutSec: 3, action: `${BASE}/twilio/recording` },
  ]);
  assert.equal(registry.phaseOf('CA1'), 'awaiting_first_input');
  assert.equal(registry.getSession('CA1')?.callerNumber, DELHI_LANDLINE);
});

test('duplicate call-start webhooks do not reset the call', async () => {
  const { controller, registry } = hindiCall();
  controller.handleIncomingCall({ callSid: 'CA1', from: DELHI_LANDLINE });
  controller.handleRecording({ callSid: 'CA1', recordingUrl: RECORDING });

  const again = controller.handleIncomingCall({ callSid: 'CA1', from: DELHI_LANDLINE });

  assert.deepEqual(kinds(again), ['say', 'record']);
  assert.equal(registry.getCall('CA1')?.turnsStarted, 1);
  assert.equal(registry.activeCallCount(), 1);
  await controller.drain();
});

test('polls while the answer is pending are idempotent', async () => {
  const { controller, registry, llm } = hindiCall();
  const release = llm.hold();
  controller.handleIncomingCall({ callSid: 'CA1', from: DELHI_LANDLINE });

  const hold = controller.handleRecording({ callSid: 'CA1', recordingUrl: RECORDING });
  assert.deepEqual(hold, [
    { kind: 'say', text: prompt('hi', 'hold'), language: 'hi' },
    { kind: 'pause', lengthSec: 3 },
    { kind: 'redirect', url: `${BASE}/twilio/poll` },
  ]);

  const first = controller.handlePoll({ callSid: 'CA1' });
  const second = controller.handlePoll({ callSid: 'CA1' });
  assert.deepEqual(first, second);
  assert.equal(only(first, 'say').text, prompt('hi', 'stillProcessing'));
  assert.equal(registry.phaseOf('CA1'), 'awaiting_playback_ready');
  assert.equal(registry.getTurnOutcome('CA1')?.status, 'running');

  release();
  await controller.drain();
});

test('a finished turn plays the answer and gathers the next input', async () => {
  const { controller, registry, tts } = hindiCall();
  controller.handleIncomingCall({ callSid: 'CA1', from: DELHI_LANDLINE });
  controller.handleRecording({ callSid: 'CA1', recordingUrl: RECORDING });
  await controller.drain();

  const script = controller.handlePoll({ callSid: 'CA1' });

  const gather = only(script, 'gather');
  assert.deepEqual(gather.prompts, [
    { kind: 'play', url: `${BASE}/twilio/audio/CA1/1` },
    { kind: 'say', text: prompt('hi', 'askNext'), language: 'hi' },
  ]);
  assert.deepEqual(gather.input, ['speech', 'dtmf']);
  assert.equal(gather.action, `${BASE}/twilio/gather`);
  assert.equal(gather.language, 'hi');
  assert.ok(gather.hints.includes('धन्यवाद'));
  assert.ok(gather.hints.includes('goodbye'));
  assert.equal(registry.phaseOf('CA1'), 'playing_response_and_gathering');

  assert.equal(controller.getAudio('CA1', 1)?.toString(), `hi:[hi-IN] ${ANSWER}`);
  assert.equal(controller.getAudio('CA1', 2), null);
  assert.equal(tts.calls.length, 1);
});

test('a spoken follow-up becomes the next turn with one English exchange of history', async () => {
  const { controller, registry, llm, stt } = hindiCall();
  controller.handleIncomingCall({ callSid: 'CA1', from: DELHI_LANDLINE });
  controller.handleRecording({ callSid: 'CA1', recordingUrl: RECORDING });
  await controller.drain();
  controller.handlePoll({ callSid: 'CA1' });

  const hold = controller.handleGather({ callSid: 'CA1', speech: FOLLOW_UP_HI });
  assert.equal(only(hold, 'say').text, prompt('hi', 'hold'));
  await controller.drain();

  assert.equal(stt.calls, 1);
  assert.equal(llm.calls[1].query, `[en-IN] ${FOLLOW_UP_HI}`);
  const instruction = llm.calls[1].instruction;
  assert.ok(instruction.includes(`Q1: [en-IN] ${QUESTION_HI}\nA1: ${ANSWER}`));
  assert.equal(instruction.includes('Q2:'), false);

  assert.deepEqual(registry.getSession('CA1')?.history(), [{ question: `[en-IN] ${QUESTION_HI}`, answer: ANSWER }]);
  const next = controller.handlePoll({ callSid: 'CA1' });
  assert.equal(only(next, 'gather').prompts[0].kind, 'play');
  assert.deepEqual(only(next, 'gather').prompts[0], { kind: 'play', url: `${BASE}/twilio/audio/CA1/2` });
});

test('spoken follow-ups keep the language the caller answered in, not the phone hint', async () => {
  const { controller, registry, llm, stt, translator, tts } = setup([
    { text: 'How much urea per acre for wheat?', language: 'en', confidence: 0.9 },
  ]);
  controller.handleIncomingCall({ callSid: 'CA1', from: DELHI_LANDLINE });
  controller.handleRecording({ callSid: 'CA1', recordingUrl: RECORDING });
  await controller.drain();
  assert.equal(registry.getLanguage('CA1'), 'en');
  assert.equal(only(controller.handlePoll({ callSid: 'CA1' }), 'gather').language, 'en');

  const hold = controller.handleGather({ callSid: 'CA1', speech: 'And when should I irrigate?' });
  assert.equal(only(hold, 'say').text, prompt('en', 'hold'));
  await controller.drain();

  assert.equal(stt.calls, 1);
  assert.equal(translator.calls.length, 0);
  assert.equal(llm.calls[1].query, 'And when should I irrigate?');
  assert.deepEqual(tts.calls[1], { text: ANSWER, language: 'en' });
  assert.equal(registry.getLanguage('CA1'), 'en');
});

test('pressing the exit key says goodbye, hangs up and releases the call', async () => {
  const { controller, registry } = hindiCall();
  controller.handleIncomingCall({ callSid: 'CA1', from: DELHI_LANDLINE });
  controller.handleRecording({ callSid: 'CA1', recordingUrl: RECORDING });
  await controller.drain();
  controller.handlePoll({ callSid: 'CA1' });

  const script = controller.handleGather({ callSid: 'CA1', digits: '#' });

  assert.deepEqual(script, [{ kind: 'say', text: prompt('hi', 'goodbye'), language: 'hi' }, { kind: 'hangup' }]);
  assert.equal(registry.phaseOf('CA1'), 'ended');
  assert.equal(registry.getSession('CA1'), undefined);
  assert.equal(registry.activeCallCount(), 0);
});

test('the turn limit ends the call after the last answer is stored', async () => {
  const { controller, registry } = setup([{ text: QUESTION_HI, language: 'auto', confidence: 0.92 }], {
    limits: { maxTurns: 1, maxDurationSec: 600 },
  });
  controller.handleIncomingCall({ callSid: 'CA1', from: DELHI_LANDLINE });
  controller.handleRecording({ callSid: 'CA1', recordingUrl: RECORDING });
  await controller.drain();
  controller.handlePoll({ callSid: 'CA1' });

  const script = controller.handleGather({ callSid: 'CA1', speech: 'मिट्टी की जांच' });

  assert.deepEqual(script, [{ kind: 'say', text: prompt('hi', 'limitReached'), language: 'hi' }, { kind: 'hangup' }]);
  assert.equal(registry.phaseOf('CA1'), 'ended');
});

test('the duration limit ends the call', async () => {
  const { controller, advance } = setup([{ text: QUESTION_HI, language: 'auto', confidence: 0.92 }], {
    limits: { maxTurns: 10, maxDurationSec: 120 },
  });
  controller.handleIncomingCall({ callSid: 'CA1', from: DELHI_LANDLINE });
  controller.handleRecording({ callSid: 'CA1', recordingUrl: RECORDING });
  await controller.drain();
  controller.handlePoll({ callSid: 'CA1' });

  advance(121_000);
  const script = controller.handleGather({ callSid: 'CA1', speech: 'मिट्टी की जांच' });

  assert.equal(only(script, 'say').text, prompt('hi', 'limitReached'));
  assert.deepEqual(kinds(script), ['say', 'hangup']);
});

test('silence is re-prompted once, then the call ends', async () => {
  const { controller, registry } = hindiCall();
  controller.handleIncomingCall({ callSid: 'CA1', from: DELHI_LANDLINE });
  controller.handleRecording({ callSid: 'CA1', recordingUrl: RECORDING });
  await controller.drain();
  controller.handlePoll({ callSid: 'CA1' });

  const reprompt = controller.handleGather({ callSid: 'CA1' });
  assert.deepEqual(only(reprompt, 'gather').prompts, [
    { kind: 'say', text: prompt('hi', 'areYouThere'), language: 'hi' },
  ]);

  const end = controller.handleGather({ callSid: 'CA1', speech: '   ' });
  assert.deepEqual(end, [{ kind: 'say', text: prompt('hi', 'goodbye'), language: 'hi' }, { kind: 'hangup' }]);
  assert.equal(registry.activeCallCount(), 0);
});

test('a turn that never finishes ends the call once the wait deadline passes', async () => {
  const { controller, registry, llm, advance } = hindiCall();
  const release = llm.hold();
  controller.handleIncomingCall({ callSid: 'CA1', from: DELHI_LANDLINE });
  controller.handleRecording({ callSid: 'CA1', recordingUrl: RECORDING });

  advance(90_000);
  assert.equal(only(controller.handlePoll({ callSid: 'CA1' }), 'say').text, prompt('hi', 'stillProcessing'));

  advance(1_000);
  const script = controller.handlePoll({ callSid: 'CA1' });
  assert.deepEqual(script, [{ kind: 'say', text: prompt('hi', 'error'), language: 'hi' }, { kind: 'hangup' }]);
  assert.equal(registry.phaseOf('CA1'), 'ended');

  release();
  await controller.drain();
  assert.equal(registry.getTurnOutcome('CA1'), undefined);
  assert.equal(registry.activeCallCount(), 0);
});

test('a failed turn apologises and hangs up', async () => {
  const { controller, llm } = hindiCall();
  llm.failWith = new Error('rate limited');
  controller.handleIncomingCall({ callSid: 'CA1', from: DELHI_LANDLINE });
  controller.handleRecording({ callSid: 'CA1', recordingUrl: RECORDING });
  await controller.drain();

  const script = controller.handlePoll({ callSid: 'CA1' });

  assert.deepEqual(script, [{ kind: 'say', text: prompt('hi', 'error'), language: 'hi' }, { kind: 'hangup' }]);
});

test('an unusable recording plays the repeat request and records again', async () => {
  const { controller, registry } = setup([{ text: '[SILENCE_DETECTED]', language: 'auto', confidence: 0 }], {
    qualityGate: true,
  });
  controller.handleIncomingCall({ callSid: 'CA1', from: DELHI_LANDLINE });
  controller.handleRecording({ callSid: 'CA1', recordingUrl: RECORDING });
  await controller.drain();

  const script = controller.handlePoll({ callSid: 'CA1' });

  assert.deepEqual(kinds(script), ['play', 'record']);
  assert.deepEqual(only(script, 'play'), { kind: 'play', url: `${BASE}/twilio/audio/CA1/1` });
  assert.equal(controller.getAudio('CA1', 1)?.toString(), `hi:${prompt('hi', 'repeat')}`);
  assert.equal(registry.phaseOf('CA1'), 'awaiting_next_input');
  assert.equal(registry.getSession('CA1')?.turnCount, 0);
});

test('a good turn after a rejected recording still allows one silence re-prompt', async () => {
  const { controller, registry } = setup(
    [
      { text: '[SILENCE_DETECTED]', language: 'auto', confidence: 0 },
      { text: QUESTION_HI, language: 'auto', confidence: 0.92 },
    ],
    { qualityGate: true },
  );
  controller.handleIncomingCall({ callSid: 'CA1', from: DELHI_LANDLINE });
  controller.handleRecording({ callSid: 'CA1', recordingUrl: RECORDING });
  await controller.drain();

  assert.deepEqual(kinds(controller.handlePoll({ callSid: 'CA1' })), ['play', 'record']);
  assert.deepEqual(kinds(controller.handlePoll({ callSid: 'CA1' })), ['play', 'record']);
  assert.equal(registry.getCall('CA1')?.silentPrompts, 1);

  controller.handleRecording({ callSid: 'CA1', recordingUrl: RECORDING });
  await controller.drain();
  assert.deepEqual(kinds(controller.handlePoll({ callSid: 'CA1' })), ['gather']);
  assert.equal(registry.getCall('CA1')?.silentPrompts, 0);

  const reprompt = controller.handleGather({ callSid: 'CA1' });
  assert.deepEqual(only(reprompt, 'gather').prompts, [
    { kind: 'say', text: prompt('hi', 'areYouThere'), language: 'hi' },
  ]);
  assert.equal(registry.getSession('CA1')?.turnCount, 1);
});

test('speech in a language the carrier cannot recognise goes back to recording', async () => {
  const { controller, registry } = setup([{ text: 'ਕਣਕ ਦੀ ਫਸਲ', language: 'pa', confidence: 0.8 }]);
  controller.handleIncomingCall({ callSid: 'CA1', from: '+91 172 234 5678' });
  controller.handleRecording({ callSid: 'CA1', recordingUrl: RECORDING });
  await controller.drain();
  controller.handlePoll({ callSid: 'CA1' });

  const script = controller.handleGather({ callSid: 'CA1', speech: 'wheat question' });

  assert.deepEqual(script, [
    { kind: 'say', text: prompt('pa', 'recordNext'), language: 'pa' },
    { kind: 'record', maxLengthSec: 30, silenceTimeoutSec: 3, action: `${BASE}/twilio/recording` },
  ]);
  assert.equal(registry.phaseOf('CA1'), 'awaiting_next_input');
  assert.equal(registry.getSession('CA1')?.turnCount, 1);
});

test('a recording that arrives mid-turn does not start another turn', async () => {
  const { controller, registry, llm } = hindiCall();
  const release = llm.hold();
  controller.handleIncomingCall({ callSid: 'CA1', from: DELHI_LANDLINE });
  controller.handleRecording({ callSid: 'CA1', recordingUrl: RECORDING });

  const script = controller.handleRecording({ callSid: 'CA1', recordingUrl: `${RECORDING}-again` });

  assert.equal(only(script, 'say').text, prompt('hi', 'hold'));
  assert.equal(registry.getCall('CA1')?.turnsStarted, 1);

  release();
  await controller.drain();
});

test('webhooks for unknown calls say goodbye and hang up', () => {
  const { controller } = hindiCall();

  for (const script of [
    controller.handlePoll({ callSid: 'CA404' }),
    controller.handleRecording({ callSid: 'CA404', recordingUrl: RECORDING }),
    controller.handleGather({ callSid: 'CA404', digits: '1' }),
  ]) {
    assert.deepEqual(script, [{ kind: 'say', text: prompt('hi', 'goodbye'), language: 'hi' }, { kind: 'hangup' }]);
  }
});

test('terminal status callbacks release the call', () => {
  const { controller, registry } = hindiCall();
  controller.handleIncomingCall({ callSid: 'CA1', from: DELHI_LANDLINE });

  controller.handleStatus({ callSid: 'CA1', callStatus: 'in-progress' });
  assert.equal(registry.activeCallCount(), 1);

  controller.handleStatus({ callSid: 'CA1', callStatus: 'completed' });
  assert.equal(registry.activeCallCount(), 0);
  assert.equal(registry.getSession('CA1'), undefined);
});
