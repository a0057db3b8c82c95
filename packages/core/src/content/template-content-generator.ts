import { DEFAULT_RANDOM, pick, RandomSource } from '../agents/random-source';
import { ALL_STANCES, BilingualText, Stance } from '../types/senate.types';

import { ContentGenerator, GeneratedSpeech, SpeechRequest } from './content-generator';
import phrases from './speech-phrases.json';

export interface ArgumentPhrase extends BilingualText {
  keyPoint: string;
}

export interface PhraseBook {
  openings: readonly BilingualText[];
  arguments: Record<Stance, readonly ArgumentPhrase[]>;
  closings: readonly BilingualText[];
}

const DEFAULT_PHRASE_BOOK: PhraseBook = phrases;

const TOPIC_PLACEHOLDER = /\{topic\}/g;

/**
 * Offline generator assembling a short speech (opening, argument, closing) from a phrase book.
 * Draws, in order: a stance when no hint is given, then the opening, argument and closing.
 */
export class TemplateContentGenerator implements ContentGenerator {
  constructor(
    private readonly random: RandomSource = DEFAULT_RANDOM,
    private readonly book: PhraseBook = DEFAULT_PHRASE_BOOK
  ) {}

  async generate(request: SpeechRequest): Promise<GeneratedSpeech> {
    const stance = request.stanceHint ?? pick(this.random, ALL_STANCES);
    const fill = (text: string): string => text.replace(TOPIC_PLACEHOLDER, request.topic);

    const opening = pick(this.random, this.book.openings);
    const argument = pick(this.random, this.book.arguments[stance]);
    const closing = pick(this.random, this.book.closings);

    return {
      content: {
        original: [opening.original, fill(argument.original), closing.original].join(' '),
        translation: [opening.translation, fill(argument.translation), closing.translation].join(' '),
      },
      stance,
      keyPoints: [fill(argument.keyPoint)],
    };
  }
}
