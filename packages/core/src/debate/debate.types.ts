import { InterjectionEvent, InterjectionType, ReactionEvent, SpeechEvent, StanceChangeEvent } from '../types/event.types';
import { Senator } from '../types/senate.types';

/** String literal constants for the manager's lifecycle phase */
export const DEBATE_PHASES = {
  NOT_STARTED: 'not_started',
  IN_PROGRESS: 'in_progress',
  ENDED: 'ended',
} as const;

export type DebatePhase = (typeof DEBATE_PHASES)[keyof typeof DEBATE_PHASES];

/** A transition the manager refused; nothing changed. */
export interface Rejected {
  accepted: false;
  reason: string;
}

export type TransitionResult = { accepted: true } | Rejected;

export type SpeechResult = { accepted: true; event: SpeechEvent } | Rejected;

export type EndResult = { accepted: true; summary: DebateSummary } | Rejected;

/**
 * The manager's decision on one interjection.
 */
export interface InterjectionRuling {
  eventId: string;
  interjector: string;
  speaker: string | null; // Speaker holding the floor at the time, if any.
  interjectionType: InterjectionType;
  allowed: boolean;
  disrupted: boolean; // Allowed and of a disruptive type.
  reason: string;
}

export interface DebateSummary {
  debateId: string;
  topic: string;
  participants: string[];
  startedAt: string;
  endedAt: string;
  durationMs: number;
  speechCounts: Record<string, number>; // Speeches per senator name, zero entries included.
  totalSpeeches: number;
  mostActiveSpeaker: string | null; // Ties go to the earliest registered senator.
  interjections: {
    allowed: number;
    denied: number;
    rulings: InterjectionRuling[];
  };
  reactions: number;
  stanceChanges: number;
}

export interface SpeechFailure {
  speaker: string;
  error: string;
}

export type ConductResult =
  | { accepted: true; summary: DebateSummary; speeches: SpeechEvent[]; failures: SpeechFailure[] }
  | Rejected;

/**
 * Optional callbacks invoked as the debate progresses. They are the engine's display sink;
 * a callback that throws is logged and the debate carries on.
 */
export interface DebateHooks {
  onDebateStart?: (topic: string, participants: readonly Senator[]) => void;

  onSpeakerChange?: (speaker: Senator) => void;

  /** Called before the speech is published, so it precedes any reaction to it. */
  onSpeech?: (event: SpeechEvent) => void;

  onReaction?: (event: ReactionEvent) => void;

  /** Called only for interjections the speaker must yield to; denied ones appear in the summary rulings. */
  onInterjection?: (event: InterjectionEvent) => void;

  onStanceChange?: (event: StanceChangeEvent) => void;

  onDebateEnd?: (summary: DebateSummary) => void;

  /** The content generator failed or timed out; the debate moves on to the next speaker. */
  onSpeechFailed?: (speaker: Senator, error: Error) => void;
}
