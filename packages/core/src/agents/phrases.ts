import { InterjectionType, ReactionType } from '../types/event.types';
import { BilingualText } from '../types/senate.types';

import phrases from './phrases.json';
import { pick, RandomSource } from './random-source';

const REACTION_PHRASES: Record<ReactionType, readonly string[]> = phrases.reactions;
const INTERJECTION_PHRASES: Record<InterjectionType, readonly BilingualText[]> = phrases.interjections;

const SPEAKER_PLACEHOLDER = /\{speaker\}/g;

export function fillSpeaker(template: string, speakerName: string): string {
  return template.replace(SPEAKER_PLACEHOLDER, speakerName);
}

/**
 * One reaction line with the speaker's name filled in, e.g. "nods firmly at the words of Cato."
 */
export function reactionPhrase(random: RandomSource, type: ReactionType, speakerName: string): string {
  return fillSpeaker(pick(random, REACTION_PHRASES[type]), speakerName);
}

export function interjectionPhrase(random: RandomSource, type: InterjectionType, speakerName: string): BilingualText {
  const template = pick(random, INTERJECTION_PHRASES[type]);
  return {
    original: fillSpeaker(template.original, speakerName),
    translation: fillSpeaker(template.translation, speakerName),
  };
}
