import { createInterjectionEvent, createReactionEvent, createStanceChangeEvent } from '../events/event-factory';
import { EventBus } from '../events/event-bus';
import { AgentMemory } from '../memory/agent-memory';
import {
  assertNever,
  DEBATE_EVENT_SUBTYPES,
  DebateEvent,
  EVENT_TYPES,
  SpeechEvent,
} from '../types/event.types';
import { ALL_STANCES, Senator, Stance } from '../types/senate.types';
import { getErrorMessage } from '../utils/common';
import { EngineLogger, SILENT_LOGGER } from '../utils/logger';

import {
  alignmentOf,
  chooseInterjectionType,
  chooseReactionType,
  DecisionConfig,
  interjectionImpact,
  interjectionProbability,
  reactionImpact,
  reactionProbability,
  resolveDecisionConfig,
  resolveStanceShift,
  stanceChangeProbability,
} from './decision-model';
import { interjectionPhrase, reactionPhrase } from './phrases';
import { DEFAULT_RANDOM, pick, RandomSource } from './random-source';

/** String literal constants for an agent's participation state */
export const AGENT_STATES = {
  IDLE: 'idle',
  OBSERVING: 'observing',
  SPEAKING: 'speaking',
} as const;

export type AgentState = (typeof AGENT_STATES)[keyof typeof AGENT_STATES];

export interface SenatorAgentOptions {
  bus: EventBus;
  random?: RandomSource;
  decision?: Partial<DecisionConfig>;
  stances?: Record<string, Stance>; // Initial stance per topic; topics not listed get a random stance.
  memory?: AgentMemory;
  logger?: EngineLogger;
}

/**
 * An autonomous participant. It listens to debate and speech events on the bus at its rank's
 * priority and may answer a speech with a reaction, an interjection and a change of stance.
 *
 * Each decision step is isolated: a failure inside one is logged and treated as "no action",
 * and the remaining steps still run.
 */
export class SenatorAgent {
  readonly senator: Senator;
  readonly memory: AgentMemory;

  private readonly bus: EventBus;
  private readonly random: RandomSource;
  private readonly config: DecisionConfig;
  private readonly stances: Readonly<Record<string, Stance>>;
  private readonly logger: EngineLogger;

  private agentState: AgentState = AGENT_STATES.IDLE;
  private topic: string | undefined;
  private speaker: Senator | undefined;
  private inProgress = false;
  private disposed = false;

  constructor(senator: Senator, options: SenatorAgentOptions) {
    this.senator = Object.freeze({ ...senator });
    this.bus = options.bus;
    this.random = options.random ?? DEFAULT_RANDOM;
    this.config = resolveDecisionConfig(options.decision);
    this.stances = { ...(options.stances ?? {}) };
    this.memory = options.memory ?? new AgentMemory();
    this.logger = options.logger ?? SILENT_LOGGER;

    this.bus.subscribe(EVENT_TYPES.DEBATE, this.handleDebateEvent, { subscriber: this.senator });
    this.bus.subscribe(EVENT_TYPES.SPEECH, this.handleSpeechEvent, { subscriber: this.senator });
  }

  get state(): AgentState {
    return this.agentState;
  }

  get activeTopic(): string | undefined {
    return this.topic;
  }

  get currentSpeaker(): Senator | undefined {
    return this.speaker;
  }

  get debateInProgress(): boolean {
    return this.inProgress;
  }

  currentStance(topic: string | undefined = this.topic): Stance | undefined {
    return topic === undefined ? undefined : this.memory.currentStance(topic);
  }

  /** Stops listening to the bus. Safe to call more than once. */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.bus.unsubscribe(EVENT_TYPES.DEBATE, this.handleDebateEvent);
    this.bus.unsubscribe(EVENT_TYPES.SPEECH, this.handleSpeechEvent);
  }

  private readonly handleDebateEvent = (event: DebateEvent): void => {
    this.memory.recordEvent(event);
    switch (event.subtype) {
      case DEBATE_EVENT_SUBTYPES.DEBATE_START:
        this.topic = event.topic;
        this.speaker = undefined;
        this.inProgress = true;
        this.agentState = AGENT_STATES.OBSERVING;
        this.adoptInitialStance(event.topic);
        break;
      case DEBATE_EVENT_SUBTYPES.SPEAKER_CHANGE:
        if (!this.inProgress || event.speaker === undefined) return;
        this.speaker = event.speaker;
        this.agentState = event.speaker.id === this.senator.id ? AGENT_STATES.SPEAKING : AGENT_STATES.OBSERVING;
        break;
      case DEBATE_EVENT_SUBTYPES.TOPIC_CHANGE:
        if (!this.inProgress) return;
        this.topic = event.topic;
        this.adoptInitialStance(event.topic);
        break;
      case DEBATE_EVENT_SUBTYPES.DEBATE_END:
        this.topic = undefined;
        this.speaker = undefined;
        this.inProgress = false;
        this.agentState = AGENT_STATES.IDLE;
        break;
      default:
        assertNever(event.subtype);
    }
  };

  private readonly handleSpeechEvent = async (event: SpeechEvent): Promise<void> => {
    if (event.speaker.id === this.senator.id) {
      if (this.agentState === AGENT_STATES.SPEAKING) {
        this.agentState = AGENT_STATES.OBSERVING;
      }
      return;
    }
    if (this.agentState === AGENT_STATES.IDLE) return;

    this.memory.recordEvent(event);
    await this.runStep('reaction', event, () => this.considerReaction(event));
    await this.runStep('interjection', event, () => this.considerInterjection(event));
    await this.runStep('stance', event, () => this.considerStanceChange(event));
  };

  private async runStep(step: string, event: SpeechEvent, work: () => Promise<void>): Promise<void> {
    try {
      await work();
    } catch (error: unknown) {
      this.logger.warn('Senator decision step failed', {
        senator: this.senator.name,
        step,
        eventId: event.id,
        error: getErrorMessage(error),
      });
    }
  }

  private adoptInitialStance(topic: string): void {
    if (this.memory.currentStance(topic) !== undefined) return;
    const stance = this.stances[topic] ?? pick(this.random, ALL_STANCES);
    this.memory.setInitialStance(topic, stance);
    this.logger.debug('Initial stance adopted', { senator: this.senator.name, topic, stance });
  }

  private async considerReaction(event: SpeechEvent): Promise<void> {
    const speaker = event.speaker;
    const relationship = this.memory.relationshipScore(speaker.name);
    const topicInterest = this.random.next() * this.config.reactionTopicInterestMax;
    const probability = reactionProbability(
      { relationship, sameFaction: speaker.faction === this.senator.faction, topicInterest },
      this.config
    );
    if (this.random.next() >= probability) return;

    const alignment = alignmentOf(this.currentStance(event.topic), event.stance);
    const reactionType = chooseReactionType(this.random, relationship, alignment, this.config);
    const content = reactionPhrase(this.random, reactionType, speaker.name);

    this.memory.recordReaction(event.id, reactionType, content);
    const impact = reactionImpact(reactionType);
    if (impact !== 0) {
      this.memory.recordRelationshipImpact(speaker.name, event.id, impact, `Reacted with ${reactionType}`);
    }
    await this.bus.publish(
      createReactionEvent({
        reactor: this.senator,
        targetEventId: event.id,
        targetEventType: event.type,
        reactionType,
        content,
      })
    );
  }

  private async considerInterjection(event: SpeechEvent): Promise<void> {
    const speaker = event.speaker;
    const relationship = this.memory.relationshipScore(speaker.name);
    const alignment = alignmentOf(this.currentStance(event.topic), event.stance);
    const probability = interjectionProbability(
      { relationship, rank: this.senator.rank, stanceDiffers: alignment === 'disagree' },
      this.config
    );
    if (this.random.next() >= probability) return;

    const outOfOrder = this.speaker?.id !== speaker.id || event.topic !== this.topic;
    const interjectionType = chooseInterjectionType(
      this.random,
      { relationship, rank: this.senator.rank, alignment, outOfOrder },
      this.config
    );
    const content = interjectionPhrase(this.random, interjectionType, speaker.name);

    const impact = interjectionImpact(interjectionType);
    if (impact !== 0) {
      this.memory.recordRelationshipImpact(speaker.name, event.id, impact, `Interjected with ${interjectionType}`);
    }
    await this.bus.publish(
      createInterjectionEvent({
        interjector: this.senator,
        targetSpeaker: speaker,
        interjectionType,
        content,
        targetSpeechId: event.id,
      })
    );
  }

  private async considerStanceChange(event: SpeechEvent): Promise<void> {
    if (event.topic !== this.topic) return;
    const current = this.currentStance(event.topic);
    if (current === undefined) return;

    const speaker = event.speaker;
    const probability = stanceChangeProbability(
      {
        relationship: this.memory.relationshipScore(speaker.name),
        sameFaction: speaker.faction === this.senator.faction,
        speakerRank: speaker.rank,
      },
      this.config
    );
    if (this.random.next() >= probability) return;
    // The draw comes first, even for a senator who already agrees.
    const target = resolveStanceShift(current, event.stance);
    if (target === undefined) return;

    const reason = `Persuaded by ${speaker.name}`;
    this.memory.recordStanceChange(event.topic, current, target, reason, event.id);
    await this.bus.publish(
      createStanceChangeEvent({
        senator: this.senator,
        topic: event.topic,
        oldStance: current,
        newStance: target,
        reason,
        triggerEventId: event.id,
      })
    );
  }
}
