import { AgentMemory } from './agent-memory';
import { MemorySnapshot } from './memory.types';
import { createDebateEvent, createSpeechEvent } from '../events/event-factory';
import { makeSenator } from '../utils/test-utils';

const CATO = makeSenator({ id: 'cato', name: 'Cato', rank: 4 });
const CICERO = makeSenator({ id: 'cicero', name: 'Cicero', rank: 3 });
const FIXED_NOW = new Date('2024-03-15T12:00:00.000Z');

function speechBy(speaker: typeof CATO, id: string) {
  return createSpeechEvent(
    {
      speaker,
      topic: 'Land Reform',
      content: { original: 'Dixi.', translation: 'I have spoken.' },
      stance: 'support',
      keyPoints: [],
    },
    { id, timestamp: new Date('2024-03-15T10:00:00.000Z'), metadata: { turn: 2 } }
  );
}

describe('AgentMemory', () => {
  let memory: AgentMemory;

  beforeEach(() => {
    memory = new AgentMemory(() => FIXED_NOW);
  });

  describe('events', () => {
    it('records a compact, frozen projection of an event', () => {
      const record = memory.recordEvent(speechBy(CATO, 's1'));

      expect(record).toEqual({
        eventId: 's1',
        eventType: 'speech',
        timestamp: '2024-03-15T10:00:00.000Z',
        source: 'Cato',
        metadata: { turn: 2 },
        recordedAt: '2024-03-15T12:00:00.000Z',
      });
      expect(Object.isFrozen(record)).toBe(true);
    });

    it('records events without a source as Unknown', () => {
      memory.recordEvent(createDebateEvent({ subtype: 'DEBATE_START', topic: 'Land Reform', participants: [] }, { id: 'd1' }));

      expect(memory.eventsBySource('Unknown').map((r) => r.eventId)).toEqual(['d1']);
    });

    it('indexes events by type and by source', () => {
      memory.recordEvent(speechBy(CATO, 's1'));
      memory.recordEvent(speechBy(CICERO, 's2'));
      memory.recordEvent(speechBy(CATO, 's3'));
      memory.recordEvent(createDebateEvent({ subtype: 'DEBATE_START', topic: 'Land Reform', participants: [] }, { id: 'd1' }));

      expect(memory.eventsByType('speech').map((r) => r.eventId)).toEqual(['s1', 's2', 's3']);
      expect(memory.eventsByType('debate').map((r) => r.eventId)).toEqual(['d1']);
      expect(memory.eventsBySource('Cato').map((r) => r.eventId)).toEqual(['s1', 's3']);
      expect(memory.eventsBySource('Nobody')).toEqual([]);
      expect(memory.eventCount).toBe(4);
    });

    it('returns the most recent events newest last', () => {
      ['a', 'b', 'c', 'd', 'e', 'f'].forEach((id) => memory.recordEvent(speechBy(CATO, id)));

      expect(memory.recentEvents().map((r) => r.eventId)).toEqual(['b', 'c', 'd', 'e', 'f']);
      expect(memory.recentEvents(2).map((r) => r.eventId)).toEqual(['e', 'f']);
      expect(memory.recentEvents(0)).toEqual([]);
      expect(memory.recentEvents(-3)).toEqual([]);
    });

    it('returns copies that do not alias internal state', () => {
      memory.recordEvent(speechBy(CATO, 's1'));

      memory.eventsByType('speech').pop();

      expect(memory.eventsByType('speech')).toHaveLength(1);
    });
  });

  describe('reactions', () => {
    it('indexes reactions by the event reacted to', () => {
      memory.recordReaction('s1', 'agreement', 'nods');
      memory.recordReaction('s2', 'boredom', 'yawns');
      memory.recordReaction('s1', 'interest', 'leans in');

      expect(memory.reactionsTo('s1').map((r) => r.reactionType)).toEqual(['agreement', 'interest']);
      expect(memory.reactionsTo('missing')).toEqual([]);
      expect(memory.reactionCount).toBe(3);
    });
  });

  describe('stances', () => {
    it('starts from the initial stance and follows the change trace', () => {
      memory.setInitialStance('Land Reform', 'oppose');
      memory.recordStanceChange('Land Reform', 'oppose', 'neutral', 'Persuaded by Cicero', 's1');
      memory.recordStanceChange('Land Reform', 'neutral', 'support', 'Persuaded by Cicero', 's2');

      expect(memory.currentStance('Land Reform')).toBe('support');
      expect(memory.stanceChangesFor('Land Reform')).toEqual([
        { oldStance: 'oppose', newStance: 'neutral', reason: 'Persuaded by Cicero', eventId: 's1', timestamp: '2024-03-15T12:00:00.000Z' },
        { oldStance: 'neutral', newStance: 'support', reason: 'Persuaded by Cicero', eventId: 's2', timestamp: '2024-03-15T12:00:00.000Z' },
      ]);
    });

    it('rejects a change that does not continue the trace', () => {
      memory.setInitialStance('Land Reform', 'oppose');

      expect(() => memory.recordStanceChange('Land Reform', 'support', 'neutral', 'mistake')).toThrow(
        'Stance change on "Land Reform" starts from support but the current stance is oppose'
      );
      expect(memory.stanceChangesFor('Land Reform')).toEqual([]);
    });

    it('adopts the old stance of the first change on an unknown topic', () => {
      const record = memory.recordStanceChange('Grain Dole', 'neutral', 'support', 'Persuaded by Cato');

      expect(record.eventId).toBeUndefined();
      expect(memory.currentStance('Grain Dole')).toBe('support');
      expect(memory.toSnapshot().initialStances).toEqual({ 'Grain Dole': 'neutral' });
    });

    it('ignores a second initial stance', () => {
      memory.setInitialStance('Land Reform', 'oppose');
      memory.setInitialStance('Land Reform', 'support');

      expect(memory.currentStance('Land Reform')).toBe('oppose');
      expect(memory.currentStance('Other')).toBeUndefined();
    });
  });

  describe('relationships', () => {
    it('accumulates impacts into a score', () => {
      memory.recordRelationshipImpact('Cicero', 's1', 0.25, 'Reacted with agreement');
      memory.recordRelationshipImpact('Cicero', 's2', 0.5, 'Interjected with SUPPORT');

      expect(memory.relationshipScore('Cicero')).toBeCloseTo(0.75);
      expect(memory.relationshipScore('Cato')).toBe(0);
      expect(memory.relationshipImpactsBy('Cicero').map((r) => r.impact)).toEqual([0.25, 0.5]);
    });

    it('clamps the score to [-1, 1] while keeping the raw impacts', () => {
      memory.recordRelationshipImpact('Clodius', 's1', -0.75, 'Interjected with EMOTIONAL');
      memory.recordRelationshipImpact('Clodius', 's2', -0.75, 'Interjected with EMOTIONAL');
      memory.recordRelationshipImpact('Cato', 's3', 3, 'Reacted with agreement');

      expect(memory.relationshipScore('Clodius')).toBe(-1);
      expect(memory.relationshipScore('Cato')).toBe(1);
      expect(memory.relationshipImpactsBy('Clodius').map((r) => r.impact)).toEqual([-0.75, -0.75]);
    });

    it('moves back from the clamp boundary immediately', () => {
      memory.recordRelationshipImpact('Cato', 's1', 3, 'Reacted with agreement');
      memory.recordRelationshipImpact('Cato', 's2', -0.5, 'Reacted with disagreement');

      expect(memory.relationshipScore('Cato')).toBe(0.5);
    });
  });

  describe('snapshots', () => {
    it('rebuilds an equivalent memory with working indices', () => {
      memory.recordEvent(speechBy(CATO, 's1'));
      memory.recordReaction('s1', 'agreement', 'nods');
      memory.setInitialStance('Land Reform', 'oppose');
      memory.recordStanceChange('Land Reform', 'oppose', 'neutral', 'Persuaded by Cato', 's1');
      memory.recordRelationshipImpact('Cato', 's1', 0.25, 'Reacted with agreement');

      const snapshot: MemorySnapshot = JSON.parse(JSON.stringify(memory.toSnapshot()));
      const restored = AgentMemory.fromSnapshot(snapshot, () => FIXED_NOW);

      expect(restored.toSnapshot()).toEqual(memory.toSnapshot());
      expect(restored.eventsBySource('Cato').map((r) => r.eventId)).toEqual(['s1']);
      expect(restored.reactionsTo('s1')).toHaveLength(1);
      expect(restored.currentStance('Land Reform')).toBe('neutral');
      expect(restored.relationshipScore('Cato')).toBe(0.25);

      restored.recordStanceChange('Land Reform', 'neutral', 'support', 'Persuaded by Cato');
      expect(restored.currentStance('Land Reform')).toBe('support');
    });
  });
});
