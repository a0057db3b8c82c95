import { SpeechEvent } from '../types/event.types';
import { ALL_STANCES } from '../types/senate.types';

import { SpeechRequest } from './content-generator';

/** Most recent speeches quoted back to the model as context. */
export const PRIOR_SPEECH_LIMIT = 3;

export function buildSystemPrompt(request: SpeechRequest): string {
  const { senator } = request;
  return `You are ${senator.name}, a senator of the ${senator.faction} faction (rank ${senator.rank}) addressing the Senate of the Roman Republic.

Speak in character: formal, persuasive, brief (three to five sentences).
Deliver the speech in Latin and provide a faithful English translation.

Respond with a single JSON object and nothing else:
{
  "speech": "<the speech in Latin>",
  "translation": "<the English translation>",
  "stance": "<one of: ${ALL_STANCES.join(', ')}>",
  "keyPoints": ["<short English summary of each argument>"]
}`;
}

function quoteSpeech(speech: SpeechEvent): string {
  return `- ${speech.speaker.name} (${speech.stance}): ${speech.content.translation}`;
}

export function buildUserPrompt(request: SpeechRequest): string {
  const lines = [`The question before the Senate: ${request.topic}`];
  if (request.stanceHint !== undefined) {
    lines.push(`Your position on this question: ${request.stanceHint}.`);
  }
  const recent = request.priorSpeeches.slice(-PRIOR_SPEECH_LIMIT);
  if (recent.length > 0) {
    lines.push('', 'Speeches delivered so far:', ...recent.map(quoteSpeech));
    lines.push('', 'Answer the previous speakers where it helps your case.');
  }
  return lines.join('\n');
}
