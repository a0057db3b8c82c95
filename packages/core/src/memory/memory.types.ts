import { EventType, ReactionType } from '../types/event.types';
import { Stance } from '../types/senate.types';

/** Relationship scores are kept within this closed range. */
export const RELATIONSHIP_SCORE_RANGE = {
  MIN: -1,
  MAX: 1,
} as const;

/** Name recorded for events without a source senator. */
export const UNKNOWN_SOURCE = 'Unknown';

/**
 * Compact projection of an observed event. Timestamps are ISO strings so records stay plain data.
 */
export interface EventRecord {
  eventId: string;
  eventType: EventType;
  timestamp: string;
  source: string; // Name of the source senator, or UNKNOWN_SOURCE.
  metadata: Readonly<Record<string, unknown>>;
  recordedAt: string;
}

export interface ReactionRecord {
  eventId: string; // The event reacted to.
  reactionType: ReactionType;
  content: string;
  timestamp: string;
}

export interface StanceChangeRecord {
  oldStance: Stance;
  newStance: Stance;
  reason: string;
  eventId?: string; // Event that triggered the change, when there was one.
  timestamp: string;
}

export interface RelationshipImpactRecord {
  eventId: string;
  impact: number; // Signed delta applied to the relationship score.
  reason: string;
  timestamp: string;
}

/**
 * Serializable copy of an agent's memory.
 */
export interface MemorySnapshot {
  events: EventRecord[];
  reactions: ReactionRecord[];
  stanceChanges: Record<string, StanceChangeRecord[]>;
  relationshipImpacts: Record<string, RelationshipImpactRecord[]>;
  relationshipScores: Record<string, number>;
  initialStances: Record<string, Stance>;
}
