import {
  DebateEvent,
  DebateEventSubtype,
  EVENT_TYPES,
  EventMetadata,
  EventType,
  INTERJECTION_TYPES,
  InterjectionEvent,
  InterjectionType,
  ReactionEvent,
  ReactionType,
  SpeechEvent,
  StanceChangeEvent,
} from '../types/event.types';
import { BilingualText, Senator, Stance } from '../types/senate.types';
import { generateEventId } from '../utils/id';

/**
 * Envelope overrides accepted by every factory. Tests pass `id` and `timestamp`
 * to make events reproducible; `priority` overrides the rank-derived default.
 */
export interface EventOptions {
  id?: string;
  timestamp?: Date;
  metadata?: Record<string, unknown>;
  priority?: number;
}

/** Interjection categories that disrupt the speech they interrupt. */
const DISRUPTIVE_INTERJECTIONS: readonly InterjectionType[] = [
  INTERJECTION_TYPES.PROCEDURAL,
  INTERJECTION_TYPES.EMOTIONAL,
];

export function causesDisruption(type: InterjectionType): boolean {
  return DISRUPTIVE_INTERJECTIONS.includes(type);
}

function freezeSenator(senator: Senator): Senator {
  return Object.freeze({ ...senator });
}

function freezeText(text: BilingualText): BilingualText {
  return Object.freeze({ original: text.original, translation: text.translation });
}

function buildEnvelope<T extends EventType>(type: T, source: Senator | undefined, options: EventOptions) {
  const metadata: EventMetadata = Object.freeze({ ...(options.metadata ?? {}) });
  return {
    id: options.id ?? generateEventId(),
    type,
    timestamp: options.timestamp ?? new Date(),
    ...(source !== undefined && { source: freezeSenator(source) }),
    metadata,
    priority: options.priority ?? source?.rank ?? 0,
  };
}

export interface DebateEventParams {
  subtype: DebateEventSubtype;
  topic: string;
  participants: readonly string[];
  speaker?: Senator;
  previousTopic?: string;
  source?: Senator;
}

/**
 * Creates a frozen debate lifecycle event. For SPEAKER_CHANGE the speaker is also the source
 * unless another source is given.
 */
export function createDebateEvent(params: DebateEventParams, options: EventOptions = {}): DebateEvent {
  const source = params.source ?? params.speaker;
  const event: DebateEvent = {
    ...buildEnvelope(EVENT_TYPES.DEBATE, source, options),
    subtype: params.subtype,
    topic: params.topic,
    participants: Object.freeze([...params.participants]),
    ...(params.speaker !== undefined && { speaker: freezeSenator(params.speaker) }),
    ...(params.previousTopic !== undefined && { previousTopic: params.previousTopic }),
  };
  return Object.freeze(event);
}

export interface SpeechEventParams {
  speaker: Senator;
  topic: string;
  content: BilingualText;
  stance: Stance;
  keyPoints: readonly string[];
}

export function createSpeechEvent(params: SpeechEventParams, options: EventOptions = {}): SpeechEvent {
  const event: SpeechEvent = {
    ...buildEnvelope(EVENT_TYPES.SPEECH, params.speaker, options),
    speaker: freezeSenator(params.speaker),
    topic: params.topic,
    content: freezeText(params.content),
    stance: params.stance,
    keyPoints: Object.freeze([...params.keyPoints]),
  };
  return Object.freeze(event);
}

export interface ReactionEventParams {
  reactor: Senator;
  targetEventId: string;
  targetEventType: EventType;
  reactionType: ReactionType;
  content: string;
}

export function createReactionEvent(params: ReactionEventParams, options: EventOptions = {}): ReactionEvent {
  const event: ReactionEvent = {
    ...buildEnvelope(EVENT_TYPES.REACTION, params.reactor, options),
    reactor: freezeSenator(params.reactor),
    targetEventId: params.targetEventId,
    targetEventType: params.targetEventType,
    reactionType: params.reactionType,
    content: params.content,
  };
  return Object.freeze(event);
}

export interface InterjectionEventParams {
  interjector: Senator;
  targetSpeaker: Senator;
  interjectionType: InterjectionType;
  content: BilingualText;
  targetSpeechId: string;
}

/**
 * Creates a frozen interjection; `causesDisruption` is derived from the interjection type.
 */
export function createInterjectionEvent(params: InterjectionEventParams, options: EventOptions = {}): InterjectionEvent {
  const event: InterjectionEvent = {
    ...buildEnvelope(EVENT_TYPES.INTERJECTION, params.interjector, options),
    interjector: freezeSenator(params.interjector),
    targetSpeaker: freezeSenator(params.targetSpeaker),
    interjectionType: params.interjectionType,
    content: freezeText(params.content),
    targetSpeechId: params.targetSpeechId,
    causesDisruption: causesDisruption(params.interjectionType),
  };
  return Object.freeze(event);
}

export interface StanceChangeEventParams {
  senator: Senator;
  topic: string;
  oldStance: Stance;
  newStance: Stance;
  reason: string;
  triggerEventId: string;
}

export function createStanceChangeEvent(params: StanceChangeEventParams, options: EventOptions = {}): StanceChangeEvent {
  const event: StanceChangeEvent = {
    ...buildEnvelope(EVENT_TYPES.STANCE_CHANGE, params.senator, options),
    senator: freezeSenator(params.senator),
    topic: params.topic,
    oldStance: params.oldStance,
    newStance: params.newStance,
    reason: params.reason,
    triggerEventId: params.triggerEventId,
  };
  return Object.freeze(event);
}
