import VoiceResponse from 'twilio/lib/twiml/VoiceResponse';
import { languageProfile, LanguageCode } from '../config/languages';
import type { PlayAction, SpeakAction, VoiceScript } from '../types';

interface SayTarget {
  say(attributes: VoiceResponse.SayAttributes, message: string): VoiceResponse.Say;
  play(attributes: VoiceResponse.PlayAttributes, url: string): VoiceResponse.Play;
}

function sayAttributes(language: LanguageCode): VoiceResponse.SayAttributes {
  const profile = languageProfile(language);
  return profile.sayVoice
    ? { voice: profile.sayVoice, language: profile.sayLanguage }
    : { language: profile.sayLanguage };
}

function appendPrompt(target: SayTarget, action: SpeakAction | PlayAction): void {
  if (action.kind === 'say') {
    target.say(sayAttributes(action.language), action.text);
  } else {
    target.play({}, action.url);
  }
}

/** Renders a voice script as a TwiML document. */
export function renderTwiml(script: VoiceScript): string {
  const response = new VoiceResponse();

  for (const action of script) {
    switch (action.kind) {
      case 'say':
      case 'play':
        appendPrompt(response, action);
        break;
      case 'record':
        response.record({
          action: action.action,
          method: 'POST',
          maxLength: action.maxLengthSec,
          timeout: action.silenceTimeoutSec,
          playBeep: true,
          trim: 'trim-silence',
        });
        break;
      case 'gather': {
        const gather = response.gather({
          input: action.input,
          action: action.action,
          method: 'POST',
          timeout: action.timeoutSec,
          speechTimeout: 'auto',
          language: languageProfile(action.language).gatherLanguage,
          hints: action.hints.join(', '),
          bargeIn: action.bargeIn,
          actionOnEmptyResult: true,
          // '#' must reach us as a digit rather than terminate input.
          finishOnKey: '',
          numDigits: 1,
        });
        for (const prompt of action.prompts) appendPrompt(gather, prompt);
        break;
      }
      case 'pause':
        response.pause({ length: action.lengthSec });
        break;
      case 'redirect':
        response.redirect({ method: 'POST' }, action.url);
        break;
      case 'hangup':
        response.hangup();
        break;
    }
  }

  return response.toString();
}
