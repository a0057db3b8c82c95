import { canInterrupt, DebateManager } from './debate-manager';
import { DebateHooks } from './debate.types';
import { SenatorAgent } from '../agents/senator-agent';
import { ContentGenerator, GeneratedSpeech, SpeechRequest } from '../content/content-generator';
import { createInterjectionEvent } from '../events/event-factory';
import { EventBus } from '../events/event-bus';
import { InterjectionType, SenateEvent } from '../types/event.types';
import { Senator } from '../types/senate.types';
import { createCapturingLogger, makeSenator } from '../utils/test-utils';

const TOPIC = 'Land Reform';
const CATO = makeSenator({ id: 'cato', name: 'Cato', faction: 'Optimates', rank: 4 });
const CICERO = makeSenator({ id: 'cicero', name: 'Cicero', faction: 'Optimates', rank: 3 });
const CLODIUS = makeSenator({ id: 'clodius', name: 'Clodius', faction: 'Populares', rank: 2 });
const MILO = makeSenator({ id: 'milo', name: 'Milo', faction: 'Optimates', rank: 2 });
const BIBULUS = makeSenator({ id: 'bibulus', name: 'Bibulus', faction: 'Optimates', rank: 1 });
const SENATE = [CATO, CICERO, CLODIUS];

function interjection(interjector: Senator, speaker: Senator, interjectionType: InterjectionType, id: string) {
  return createInterjectionEvent(
    {
      interjector,
      targetSpeaker: speaker,
      interjectionType,
      content: { original: 'Nego!', translation: 'I deny it!' },
      targetSpeechId: 'speech-1',
    },
    { id }
  );
}

function label(event: SenateEvent): string {
  return event.type === 'debate' ? event.subtype : event.type;
}

const fixedSpeeches: ContentGenerator = {
  generate: async (request: SpeechRequest) => ({
    content: { original: `Ego, ${request.senator.name}, dico.`, translation: `I, ${request.senator.name}, say.` },
    stance: request.stanceHint ?? 'support',
    keyPoints: [request.topic],
  }),
};

describe('canInterrupt', () => {
  it.each([
    [4, 2, 'CHALLENGE', true],
    [3, 2, 'EMOTIONAL', true],
    [1, 2, 'CHALLENGE', false],
    [1, 2, 'PROCEDURAL', false],
    [2, 2, 'CHALLENGE', false],
    [2, 2, 'PROCEDURAL', true],
    [0, 0, 'SUPPORT', false],
  ] as const)('rank %i against rank %i with %s is %s', (interjectorRank, speakerRank, type, expected) => {
    expect(canInterrupt(interjectorRank, speakerRank, type)).toBe(expected);
  });
});

describe('DebateManager', () => {
  let bus: EventBus;
  let manager: DebateManager;
  let events: SenateEvent[];

  beforeEach(() => {
    bus = new EventBus();
    events = [];
    bus.subscribeToAll((event) => void events.push(event));
  });

  afterEach(() => {
    manager.dispose();
  });

  describe('lifecycle', () => {
    it('records a debate from start to end in order', async () => {
      manager = new DebateManager({ bus });

      expect(await manager.startDebate(TOPIC, SENATE)).toEqual({ accepted: true });
      for (const senator of SENATE) {
        const speaker = await manager.nextSpeaker();
        expect(speaker).toEqual(senator);
        await manager.publishSpeech(senator, TOPIC, { original: 'Dixi.', translation: 'I have spoken.' }, 'support', []);
      }
      const ended = await manager.endDebate();

      expect(bus.getRecentEvents().map(label)).toEqual([
        'DEBATE_START',
        'SPEAKER_CHANGE',
        'speech',
        'SPEAKER_CHANGE',
        'speech',
        'SPEAKER_CHANGE',
        'speech',
        'DEBATE_END',
      ]);
      expect(manager.debateInProgress).toBe(false);
      expect(manager.phase).toBe('ended');
      expect(manager.currentTopic).toBeNull();
      expect(ended.accepted && ended.summary.totalSpeeches).toBe(3);
    });

    it('tracks the speaker queue and current speaker', async () => {
      manager = new DebateManager({ bus });
      await manager.startDebate(TOPIC, SENATE);

      expect(manager.speakerQueue.map((s) => s.name)).toEqual(['Cato', 'Cicero', 'Clodius']);
      await manager.nextSpeaker();

      expect(manager.currentSpeaker).toEqual(CATO);
      expect(manager.speakerQueue.map((s) => s.name)).toEqual(['Cicero', 'Clodius']);
      expect(manager.registerSpeaker(CICERO)).toBe(false);
      expect(manager.registerSpeaker(CATO)).toBe(true);
      expect(manager.speakerQueue.map((s) => s.name)).toEqual(['Cicero', 'Clodius', 'Cato']);
    });

    it('returns undefined once the queue is empty', async () => {
      manager = new DebateManager({ bus });
      await manager.startDebate(TOPIC, [CATO]);
      await manager.nextSpeaker();

      expect(await manager.nextSpeaker()).toBeUndefined();
      expect(manager.currentSpeaker).toEqual(CATO);
    });

    it('rejects a second start while a debate runs', async () => {
      const logger = createCapturingLogger();
      manager = new DebateManager({ bus, logger });
      await manager.startDebate(TOPIC, SENATE);

      const result = await manager.startDebate('Grain Dole', SENATE);

      expect(result).toEqual({ accepted: false, reason: 'Debate already in progress' });
      expect(manager.currentTopic).toBe(TOPIC);
      expect(logger.entries).toContainEqual({
        level: 'warn',
        message: 'Debate already in progress',
        fields: { topic: TOPIC },
      });
      expect(events.filter((e) => e.type === 'debate')).toHaveLength(1);
    });

    it('discards speeches and ignores speaker changes outside a debate', async () => {
      manager = new DebateManager({ bus });

      const result = await manager.publishSpeech(CATO, TOPIC, { original: 'Dixi.', translation: 'I have spoken.' }, 'oppose', []);

      expect(result).toEqual({ accepted: false, reason: 'No debate in progress; speech discarded' });
      expect(await manager.nextSpeaker()).toBeUndefined();
      expect(await manager.endDebate()).toEqual({ accepted: false, reason: 'No debate in progress; nothing to end' });
      expect(events).toEqual([]);
    });

    it('publishes a topic change with the previous topic', async () => {
      manager = new DebateManager({ bus });
      await manager.startDebate(TOPIC, SENATE);

      expect(await manager.changeTopic(TOPIC)).toEqual({ accepted: false, reason: 'Topic unchanged' });
      expect(await manager.changeTopic('Grain Dole')).toEqual({ accepted: true });

      const last = events[events.length - 1];
      expect(last).toMatchObject({ type: 'debate', subtype: 'TOPIC_CHANGE', topic: 'Grain Dole', previousTopic: TOPIC });
      expect(manager.currentTopic).toBe('Grain Dole');
    });

    it('can start a new debate after the previous one ended', async () => {
      manager = new DebateManager({ bus });
      await manager.startDebate(TOPIC, SENATE);
      await manager.endDebate();

      expect(await manager.startDebate('Grain Dole', [CATO])).toEqual({ accepted: true });
      expect(manager.speakerQueue).toEqual([CATO]);
    });
  });

  describe('interjections', () => {
    async function withSpeaker(speaker: Senator): Promise<void> {
      await manager.startDebate(TOPIC, [speaker, CATO, CICERO, BIBULUS]);
      await manager.nextSpeaker();
    }

    it('allows a senior senator to challenge and denies a junior one', async () => {
      const shown: string[] = [];
      manager = new DebateManager({ bus, hooks: { onInterjection: (event) => shown.push(event.id) } });
      await withSpeaker(CLODIUS);

      await bus.publish(interjection(CATO, CLODIUS, 'CHALLENGE', 'i1'));
      await bus.publish(interjection(BIBULUS, CLODIUS, 'CHALLENGE', 'i2'));

      const ended = await manager.endDebate();
      expect(ended.accepted).toBe(true);
      if (!ended.accepted) return;
      expect(ended.summary.interjections).toEqual({
        allowed: 1,
        denied: 1,
        rulings: [
          {
            eventId: 'i1',
            interjector: 'Cato',
            speaker: 'Clodius',
            interjectionType: 'CHALLENGE',
            allowed: true,
            disrupted: false,
            reason: 'Outranks the speaker',
          },
          {
            eventId: 'i2',
            interjector: 'Bibulus',
            speaker: 'Clodius',
            interjectionType: 'CHALLENGE',
            allowed: false,
            disrupted: false,
            reason: 'Insufficient rank',
          },
        ],
      });
      expect(shown).toEqual(['i1']);
    });

    it('lets an equal raise only a point of order, which disrupts the speech', async () => {
      manager = new DebateManager({ bus });
      await withSpeaker(CLODIUS);

      const challenge = manager.handleInterjection(interjection(MILO, CLODIUS, 'CHALLENGE', 'i1'));
      const order = manager.handleInterjection(interjection(MILO, CLODIUS, 'PROCEDURAL', 'i2'));

      expect(challenge).toMatchObject({ allowed: false, disrupted: false, reason: 'Insufficient rank' });
      expect(order).toMatchObject({ allowed: true, disrupted: true, reason: 'Point of order from an equal' });
    });

    it('does not mark a denied disruptive interjection as disrupting', async () => {
      manager = new DebateManager({ bus });
      await withSpeaker(CICERO);

      expect(manager.handleInterjection(interjection(BIBULUS, CICERO, 'EMOTIONAL', 'i1'))).toMatchObject({
        allowed: false,
        disrupted: false,
      });
    });

    it('discards an interjection when nobody holds the floor', async () => {
      const logger = createCapturingLogger();
      manager = new DebateManager({ bus, logger });
      await manager.startDebate(TOPIC, SENATE);

      expect(manager.handleInterjection(interjection(CATO, CLODIUS, 'CHALLENGE', 'i1'))).toBeUndefined();
      expect(logger.entries).toContainEqual({
        level: 'warn',
        message: 'Interjection discarded: no speaker holds the floor',
        fields: { eventId: 'i1', interjector: 'Cato' },
      });
    });
  });

  describe('summary', () => {
    it('reports timing, counts and the most active speaker', async () => {
      let clock = new Date('2024-03-15T10:00:00.000Z');
      manager = new DebateManager({ bus, now: () => clock });
      await manager.startDebate(TOPIC, SENATE);
      const content = { original: 'Dixi.', translation: 'I have spoken.' };
      await manager.publishSpeech(CICERO, TOPIC, content, 'support', []);
      await manager.publishSpeech(CLODIUS, TOPIC, content, 'oppose', []);
      await manager.publishSpeech(CICERO, TOPIC, content, 'support', []);
      clock = new Date('2024-03-15T10:05:00.000Z');

      const ended = await manager.endDebate();

      expect(ended.accepted).toBe(true);
      if (!ended.accepted) return;
      expect(ended.summary).toMatchObject({
        topic: TOPIC,
        participants: ['Cato', 'Cicero', 'Clodius'],
        startedAt: '2024-03-15T10:00:00.000Z',
        endedAt: '2024-03-15T10:05:00.000Z',
        durationMs: 300000,
        speechCounts: { Cato: 0, Cicero: 2, Clodius: 1 },
        totalSpeeches: 3,
        mostActiveSpeaker: 'Cicero',
        reactions: 0,
        stanceChanges: 0,
      });
      expect(ended.summary.debateId).toMatch(/^deb-\d{8}-\d{6}-[a-z0-9]+$/);
    });

    it('has no most active speaker when nobody spoke', async () => {
      manager = new DebateManager({ bus });
      await manager.startDebate(TOPIC, SENATE);

      const ended = await manager.endDebate();

      expect(ended.accepted && ended.summary.mostActiveSpeaker).toBeNull();
    });
  });

  describe('hooks', () => {
    it('calls hooks in debate order with the speech before its reactions', async () => {
      const calls: string[] = [];
      const hooks: DebateHooks = {
        onDebateStart: (topic, participants) => calls.push(`start:${topic}:${participants.length}`),
        onSpeakerChange: (speaker) => calls.push(`speaker:${speaker.name}`),
        onSpeech: (event) => calls.push(`speech:${event.speaker.name}`),
        onReaction: (event) => calls.push(`reaction:${event.reactor.name}`),
        onDebateEnd: (summary) => calls.push(`end:${summary.totalSpeeches}`),
      };
      manager = new DebateManager({ bus, hooks });
      const reactingAgent = new SenatorAgent(CICERO, {
        bus,
        random: { next: () => 0 },
        stances: { [TOPIC]: 'support' },
      });

      await manager.conductDebate(TOPIC, [CATO], { generator: fixedSpeeches });
      reactingAgent.dispose();

      expect(calls).toEqual(['start:Land Reform:1', 'speaker:Cato', 'speech:Cato', 'reaction:Cicero', 'end:1']);
    });

    it('keeps the debate running when a hook throws', async () => {
      const logger = createCapturingLogger();
      const failing: DebateHooks = {
        onDebateStart: () => {
          throw new Error('sink down');
        },
        onSpeech: () => {
          throw new Error('sink down');
        },
      };
      manager = new DebateManager({ bus, hooks: failing, logger });

      const result = await manager.conductDebate(TOPIC, [CATO], { generator: fixedSpeeches });

      expect(result.accepted).toBe(true);
      expect(manager.debateInProgress).toBe(false);
      expect(bus.getRecentEvents().map(label)).toEqual(['DEBATE_START', 'SPEAKER_CHANGE', 'speech', 'DEBATE_END']);
      expect(logger.entries.filter((entry) => entry.level === 'warn')).toEqual([
        { level: 'warn', message: 'Debate hook failed', fields: { hook: 'onDebateStart', error: 'sink down' } },
        { level: 'warn', message: 'Debate hook failed', fields: { hook: 'onSpeech', error: 'sink down' } },
      ]);
    });
  });

  describe('conductDebate', () => {
    it('gives every senator the floor once and passes earlier speeches along', async () => {
      const requests: SpeechRequest[] = [];
      const generator: ContentGenerator = {
        generate: async (request) => {
          requests.push(request);
          return fixedSpeeches.generate(request);
        },
      };
      manager = new DebateManager({ bus });

      const result = await manager.conductDebate(TOPIC, SENATE, {
        generator,
        stanceOf: (senator) => (senator.id === 'clodius' ? 'oppose' : undefined),
      });

      expect(result.accepted).toBe(true);
      if (!result.accepted) return;
      expect(requests.map((r) => [r.senator.name, r.priorSpeeches.length, r.stanceHint])).toEqual([
        ['Cato', 0, undefined],
        ['Cicero', 1, undefined],
        ['Clodius', 2, 'oppose'],
      ]);
      expect(result.speeches.map((s) => [s.speaker.name, s.stance])).toEqual([
        ['Cato', 'support'],
        ['Cicero', 'support'],
        ['Clodius', 'oppose'],
      ]);
      expect(result.speeches[0].content.translation).toBe('I, Cato, say.');
      expect(result.failures).toEqual([]);
      expect(manager.debateInProgress).toBe(false);
    });

    it('skips a speaker whose speech fails and carries on', async () => {
      const failed: string[] = [];
      const generator: ContentGenerator = {
        generate: async (request) => {
          if (request.senator.id === 'cicero') throw new Error('model offline');
          return fixedSpeeches.generate(request);
        },
      };
      manager = new DebateManager({ bus, hooks: { onSpeechFailed: (speaker, error) => failed.push(`${speaker.name}: ${error.message}`) } });

      const result = await manager.conductDebate(TOPIC, SENATE, { generator });

      expect(result.accepted).toBe(true);
      if (!result.accepted) return;
      expect(result.failures).toEqual([{ speaker: 'Cicero', error: 'model offline' }]);
      expect(failed).toEqual(['Cicero: model offline']);
      expect(result.summary.speechCounts).toEqual({ Cato: 1, Cicero: 0, Clodius: 1 });
      expect(result.summary.mostActiveSpeaker).toBe('Cato');
    });

    it('times out a generator that never answers', async () => {
      const generator: ContentGenerator = {
        generate: (request) =>
          request.senator.id === 'cato' ? new Promise<GeneratedSpeech>(() => undefined) : fixedSpeeches.generate(request),
      };
      manager = new DebateManager({ bus });

      const result = await manager.conductDebate(TOPIC, [CATO, CICERO], { generator, generatorTimeoutMs: 20 });

      expect(result.accepted).toBe(true);
      if (!result.accepted) return;
      expect(result.failures).toEqual([{ speaker: 'Cato', error: 'Speech generation for Cato timed out after 20ms' }]);
      expect(result.speeches.map((s) => s.speaker.name)).toEqual(['Cicero']);
    });

    it('refuses to run while another debate is in progress', async () => {
      manager = new DebateManager({ bus });
      await manager.startDebate(TOPIC, SENATE);

      const result = await manager.conductDebate('Grain Dole', SENATE, { generator: fixedSpeeches });

      expect(result).toEqual({ accepted: false, reason: 'Debate already in progress' });
    });

    it('runs a three-senator debate with agents reacting and interjecting', async () => {
      manager = new DebateManager({ bus });
      const agents = SENATE.map((senator) => new SenatorAgent(senator, { bus, random: { next: () => 0 } }));

      const result = await manager.conductDebate(TOPIC, SENATE, { generator: fixedSpeeches });
      agents.forEach((agent) => agent.dispose());

      expect(result.accepted).toBe(true);
      if (!result.accepted) return;
      expect(result.summary.reactions).toBe(6);
      expect(result.summary.interjections.allowed).toBe(3);
      expect(result.summary.interjections.denied).toBe(3);
      expect(
        result.summary.interjections.rulings.filter((r) => r.allowed).map((r) => `${r.interjector}>${r.speaker}`)
      ).toEqual(['Cato>Cicero', 'Cato>Clodius', 'Cicero>Clodius']);
      expect(result.summary.stanceChanges).toBe(0);
      expect(agents[0].memory.eventsByType('speech')).toHaveLength(2);
    });
  });
});
