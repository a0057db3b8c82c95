import { SpeechEvent } from '../types/event.types';
import { BilingualText, Senator, Stance } from '../types/senate.types';

/**
 * What a generator is told about the speech it must write.
 */
export interface SpeechRequest {
  senator: Senator;
  topic: string;
  stanceHint?: Stance; // The speaker's current stance, when known.
  priorSpeeches: readonly SpeechEvent[]; // Earlier speeches of this debate, oldest first.
}

export interface GeneratedSpeech {
  content: BilingualText;
  stance: Stance;
  keyPoints: string[];
}

/**
 * Produces the text of a speech. Implementations may be slow; callers bound them with a timeout.
 */
export interface ContentGenerator {
  generate(request: SpeechRequest): Promise<GeneratedSpeech>;
}

/**
 * Raised when a generator cannot produce a usable speech.
 */
export class ContentGenerationError extends Error {
  constructor(message: string, public readonly senatorName: string) {
    super(message);
    this.name = 'ContentGenerationError';
  }
}
