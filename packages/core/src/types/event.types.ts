import { BilingualText, Senator, Stance } from './senate.types';

/** String literal constants for the kinds of event carried on the bus */
export const EVENT_TYPES = {
  DEBATE: 'debate',
  SPEECH: 'speech',
  REACTION: 'reaction',
  INTERJECTION: 'interjection',
  STANCE_CHANGE: 'stance_change',
} as const;

/** Union type of all event types */
export type EventType = (typeof EVENT_TYPES)[keyof typeof EVENT_TYPES];

/** Lifecycle moments of a debate */
export const DEBATE_EVENT_SUBTYPES = {
  DEBATE_START: 'DEBATE_START',
  DEBATE_END: 'DEBATE_END',
  SPEAKER_CHANGE: 'SPEAKER_CHANGE',
  TOPIC_CHANGE: 'TOPIC_CHANGE',
} as const;

export type DebateEventSubtype = (typeof DEBATE_EVENT_SUBTYPES)[keyof typeof DEBATE_EVENT_SUBTYPES];

/** How an observing senator visibly responds to a speech */
export const REACTION_TYPES = {
  AGREEMENT: 'agreement',
  DISAGREEMENT: 'disagreement',
  INTEREST: 'interest',
  BOREDOM: 'boredom',
  SKEPTICISM: 'skepticism',
  NEUTRAL: 'neutral',
} as const;

export type ReactionType = (typeof REACTION_TYPES)[keyof typeof REACTION_TYPES];

export const ALL_REACTION_TYPES: readonly ReactionType[] = Object.values(REACTION_TYPES);

/** Categories of interruption */
export const INTERJECTION_TYPES = {
  SUPPORT: 'SUPPORT',
  CHALLENGE: 'CHALLENGE',
  PROCEDURAL: 'PROCEDURAL',
  EMOTIONAL: 'EMOTIONAL',
  INFORMATIONAL: 'INFORMATIONAL',
} as const;

export type InterjectionType = (typeof INTERJECTION_TYPES)[keyof typeof INTERJECTION_TYPES];

/** Opaque, read-only event annotations. */
export type EventMetadata = Readonly<Record<string, unknown>>;

/**
 * Fields shared by every event. Events are frozen when created and are never mutated afterwards.
 */
interface EventEnvelope<T extends EventType> {
  readonly id: string; // UUID.
  readonly type: T; // Routing tag.
  readonly timestamp: Date; // Creation time.
  readonly source?: Senator; // Senator that caused the event, if any.
  readonly metadata: EventMetadata;
  readonly priority: number; // Defaults to the source senator's rank, else 0.
}

export interface DebateEvent extends EventEnvelope<typeof EVENT_TYPES.DEBATE> {
  readonly subtype: DebateEventSubtype;
  readonly topic: string;
  readonly participants: readonly string[]; // Participant names.
  readonly speaker?: Senator; // Set for SPEAKER_CHANGE.
  readonly previousTopic?: string; // Set for TOPIC_CHANGE.
}

export interface SpeechEvent extends EventEnvelope<typeof EVENT_TYPES.SPEECH> {
  readonly speaker: Senator;
  readonly topic: string;
  readonly content: BilingualText;
  readonly stance: Stance;
  readonly keyPoints: readonly string[];
}

export interface ReactionEvent extends EventEnvelope<typeof EVENT_TYPES.REACTION> {
  readonly reactor: Senator;
  readonly targetEventId: string;
  readonly targetEventType: EventType;
  readonly reactionType: ReactionType;
  readonly content: string;
}

export interface InterjectionEvent extends EventEnvelope<typeof EVENT_TYPES.INTERJECTION> {
  readonly interjector: Senator;
  readonly targetSpeaker: Senator;
  readonly interjectionType: InterjectionType;
  readonly content: BilingualText;
  readonly targetSpeechId: string;
  readonly causesDisruption: boolean;
}

export interface StanceChangeEvent extends EventEnvelope<typeof EVENT_TYPES.STANCE_CHANGE> {
  readonly senator: Senator;
  readonly topic: string;
  readonly oldStance: Stance;
  readonly newStance: Stance;
  readonly reason: string;
  readonly triggerEventId: string;
}

/** Every event the bus can carry, discriminated on `type`. */
export type SenateEvent = DebateEvent | SpeechEvent | ReactionEvent | InterjectionEvent | StanceChangeEvent;

/** Maps an event type tag to its event interface. */
export type EventOfType<T extends EventType> = Extract<SenateEvent, { type: T }>;

/**
 * Returns the id of the speech a reaction or interjection refers to, or undefined for other events.
 */
export function referencedEventId(event: SenateEvent): string | undefined {
  switch (event.type) {
    case EVENT_TYPES.REACTION:
      return event.targetEventId;
    case EVENT_TYPES.INTERJECTION:
      return event.targetSpeechId;
    case EVENT_TYPES.DEBATE:
    case EVENT_TYPES.SPEECH:
    case EVENT_TYPES.STANCE_CHANGE:
      return undefined;
    default:
      return assertNever(event);
  }
}

/**
 * Exhaustiveness helper for switches over closed unions.
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
