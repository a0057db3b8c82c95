import { EventType, ReactionType, SenateEvent } from '../types/event.types';
import { Stance } from '../types/senate.types';
import { clamp } from '../utils/common';

import {
  EventRecord,
  MemorySnapshot,
  ReactionRecord,
  RELATIONSHIP_SCORE_RANGE,
  RelationshipImpactRecord,
  StanceChangeRecord,
  UNKNOWN_SOURCE,
} from './memory.types';

function appendTo<K, V>(index: Map<K, V[]>, key: K, value: V): void {
  const list = index.get(key);
  if (list) {
    list.push(value);
  } else {
    index.set(key, [value]);
  }
}

function mapToRecord<V>(map: Map<string, V[]>): Record<string, V[]> {
  const out: Record<string, V[]> = {};
  for (const [key, list] of map) out[key] = [...list];
  return out;
}

/**
 * Private, append-only record of what one senator observed and decided.
 *
 * Every log has a companion index that is updated on append, so the query methods
 * never rescan the logs. Query results are copies; records themselves are frozen.
 */
export class AgentMemory {
  private readonly eventHistory: EventRecord[] = [];
  private readonly reactionHistory: ReactionRecord[] = [];
  private readonly stanceChanges = new Map<string, StanceChangeRecord[]>();
  private readonly relationshipImpacts = new Map<string, RelationshipImpactRecord[]>();
  private readonly relationshipScores = new Map<string, number>();
  private readonly initialStances = new Map<string, Stance>();

  private readonly eventsByTypeIndex = new Map<EventType, EventRecord[]>();
  private readonly eventsBySourceIndex = new Map<string, EventRecord[]>();
  private readonly reactionsByEventIndex = new Map<string, ReactionRecord[]>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  recordEvent(event: SenateEvent): EventRecord {
    const record: EventRecord = Object.freeze({
      eventId: event.id,
      eventType: event.type,
      timestamp: event.timestamp.toISOString(),
      source: event.source?.name ?? UNKNOWN_SOURCE,
      metadata: Object.freeze({ ...event.metadata }),
      recordedAt: this.now().toISOString(),
    });
    this.indexEvent(record);
    return record;
  }

  recordReaction(eventId: string, reactionType: ReactionType, content: string): ReactionRecord {
    const record: ReactionRecord = Object.freeze({
      eventId,
      reactionType,
      content,
      timestamp: this.now().toISOString(),
    });
    this.indexReaction(record);
    return record;
  }

  /**
   * Sets the stance a topic's trace starts from. Ignored once the topic has a stance.
   */
  setInitialStance(topic: string, stance: Stance): void {
    if (this.currentStance(topic) !== undefined) return;
    this.initialStances.set(topic, stance);
  }

  /**
   * The latest stance on a topic: the newest change record, else the initial stance.
   */
  currentStance(topic: string): Stance | undefined {
    const changes = this.stanceChanges.get(topic);
    const last = changes?.[changes.length - 1];
    return last ? last.newStance : this.initialStances.get(topic);
  }

  /**
   * Appends a stance change. `oldStance` must continue the existing trace for the topic.
   *
   * @throws {Error} If `oldStance` differs from the current stance on the topic.
   */
  recordStanceChange(topic: string, oldStance: Stance, newStance: Stance, reason: string, eventId?: string): StanceChangeRecord {
    const current = this.currentStance(topic);
    if (current === undefined) {
      this.initialStances.set(topic, oldStance);
    } else if (current !== oldStance) {
      throw new Error(`Stance change on "${topic}" starts from ${oldStance} but the current stance is ${current}`);
    }
    const record: StanceChangeRecord = Object.freeze({
      oldStance,
      newStance,
      reason,
      ...(eventId !== undefined && { eventId }),
      timestamp: this.now().toISOString(),
    });
    appendTo(this.stanceChanges, topic, record);
    return record;
  }

  /**
   * Appends a relationship impact and moves the cached score by `impactDelta`, clamped to [-1, 1].
   */
  recordRelationshipImpact(senatorName: string, eventId: string, impactDelta: number, reason: string): RelationshipImpactRecord {
    const record: RelationshipImpactRecord = Object.freeze({
      eventId,
      impact: impactDelta,
      reason,
      timestamp: this.now().toISOString(),
    });
    appendTo(this.relationshipImpacts, senatorName, record);
    const next = this.relationshipScore(senatorName) + impactDelta;
    this.relationshipScores.set(senatorName, clamp(next, RELATIONSHIP_SCORE_RANGE.MIN, RELATIONSHIP_SCORE_RANGE.MAX));
    return record;
  }

  relationshipScore(senatorName: string): number {
    return this.relationshipScores.get(senatorName) ?? 0;
  }

  eventsByType(type: EventType): EventRecord[] {
    return [...(this.eventsByTypeIndex.get(type) ?? [])];
  }

  eventsBySource(sourceName: string): EventRecord[] {
    return [...(this.eventsBySourceIndex.get(sourceName) ?? [])];
  }

  reactionsTo(eventId: string): ReactionRecord[] {
    return [...(this.reactionsByEventIndex.get(eventId) ?? [])];
  }

  stanceChangesFor(topic: string): StanceChangeRecord[] {
    return [...(this.stanceChanges.get(topic) ?? [])];
  }

  relationshipImpactsBy(senatorName: string): RelationshipImpactRecord[] {
    return [...(this.relationshipImpacts.get(senatorName) ?? [])];
  }

  /**
   * Up to `count` of the most recently recorded events, newest last.
   */
  recentEvents(count: number = 5): EventRecord[] {
    if (count <= 0) return [];
    return this.eventHistory.slice(-count);
  }

  get eventCount(): number {
    return this.eventHistory.length;
  }

  get reactionCount(): number {
    return this.reactionHistory.length;
  }

  toSnapshot(): MemorySnapshot {
    return {
      events: [...this.eventHistory],
      reactions: [...this.reactionHistory],
      stanceChanges: mapToRecord(this.stanceChanges),
      relationshipImpacts: mapToRecord(this.relationshipImpacts),
      relationshipScores: Object.fromEntries(this.relationshipScores),
      initialStances: Object.fromEntries(this.initialStances),
    };
  }

  /**
   * Rebuilds a memory, indices included, from a snapshot.
   */
  static fromSnapshot(snapshot: MemorySnapshot, now?: () => Date): AgentMemory {
    const memory = new AgentMemory(now);
    snapshot.events.forEach((record) => memory.indexEvent(Object.freeze({ ...record })));
    snapshot.reactions.forEach((record) => memory.indexReaction(Object.freeze({ ...record })));
    for (const [topic, records] of Object.entries(snapshot.stanceChanges)) {
      records.forEach((record) => appendTo(memory.stanceChanges, topic, Object.freeze({ ...record })));
    }
    for (const [name, records] of Object.entries(snapshot.relationshipImpacts)) {
      records.forEach((record) => appendTo(memory.relationshipImpacts, name, Object.freeze({ ...record })));
    }
    for (const [name, score] of Object.entries(snapshot.relationshipScores)) {
      memory.relationshipScores.set(name, score);
    }
    for (const [topic, stance] of Object.entries(snapshot.initialStances)) {
      memory.initialStances.set(topic, stance);
    }
    return memory;
  }

  private indexEvent(record: EventRecord): void {
    this.eventHistory.push(record);
    appendTo(this.eventsByTypeIndex, record.eventType, record);
    appendTo(this.eventsBySourceIndex, record.source, record);
  }

  private indexReaction(record: ReactionRecord): void {
    this.reactionHistory.push(record);
    appendTo(this.reactionsByEventIndex, record.eventId, record);
  }
}
