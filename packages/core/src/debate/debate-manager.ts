import { ContentGenerator, GeneratedSpeech } from '../content/content-generator';
import { createDebateEvent, createSpeechEvent } from '../events/event-factory';
import { EventBus } from '../events/event-bus';
import {
  DEBATE_EVENT_SUBTYPES,
  EVENT_TYPES,
  INTERJECTION_TYPES,
  InterjectionEvent,
  InterjectionType,
  ReactionEvent,
  SpeechEvent,
  StanceChangeEvent,
} from '../types/event.types';
import { BilingualText, Senator, Stance } from '../types/senate.types';
import { getErrorMessage } from '../utils/common';
import { generateDebateId } from '../utils/id';
import { EngineLogger, SILENT_LOGGER } from '../utils/logger';
import { delay, withTimeout } from '../utils/promise';

import {
  ConductResult,
  DEBATE_PHASES,
  DebateHooks,
  DebatePhase,
  DebateSummary,
  EndResult,
  InterjectionRuling,
  Rejected,
  SpeechFailure,
  SpeechResult,
  TransitionResult,
} from './debate.types';

export const DEFAULT_GENERATOR_TIMEOUT_MS = 30_000;
export const DEFAULT_PAUSE_MS = 0;

/**
 * Whether a senator of `interjectorRank` may interrupt a speaker of `speakerRank`.
 * Higher rank always may; equal rank only to raise a point of order.
 */
export function canInterrupt(interjectorRank: number, speakerRank: number, type: InterjectionType): boolean {
  if (interjectorRank > speakerRank) return true;
  return interjectorRank === speakerRank && type === INTERJECTION_TYPES.PROCEDURAL;
}

export interface DebateManagerOptions {
  bus: EventBus;
  hooks?: DebateHooks;
  logger?: EngineLogger;
  now?: () => Date;
}

export interface ConductOptions {
  generator: ContentGenerator;
  pauseMs?: number; // Pause after each speech.
  generatorTimeoutMs?: number; // Per-speech limit; non-positive disables it.
  stanceOf?: (senator: Senator, topic: string) => Stance | undefined; // Source of stance hints.
}

interface DebateStats {
  debateId: string;
  startedAt: Date;
  speechCounts: Map<string, number>;
  rulings: InterjectionRuling[];
  reactions: number;
  stanceChanges: number;
}

function rejected(reason: string): Rejected {
  return { accepted: false, reason };
}

/**
 * Runs one debate at a time over an {@link EventBus}: lifecycle and speaker rotation,
 * speech publication, and arbitration of the interjections senators raise.
 *
 * Invalid transitions are returned as rejected results and logged as warnings; they never throw.
 */
export class DebateManager {
  private readonly bus: EventBus;
  private readonly hooks: DebateHooks;
  private readonly logger: EngineLogger;
  private readonly now: () => Date;

  private debatePhase: DebatePhase = DEBATE_PHASES.NOT_STARTED;
  private topic: string | null = null;
  private speaker: Senator | null = null;
  private queue: Senator[] = [];
  private participants: Senator[] = [];
  private stats: DebateStats | null = null;

  constructor(options: DebateManagerOptions) {
    this.bus = options.bus;
    this.hooks = options.hooks ?? {};
    this.logger = options.logger ?? SILENT_LOGGER;
    this.now = options.now ?? (() => new Date());

    this.bus.subscribe(EVENT_TYPES.INTERJECTION, this.onInterjectionEvent, { name: 'DebateManager:interjection' });
    this.bus.subscribe(EVENT_TYPES.REACTION, this.onReactionEvent, { name: 'DebateManager:reaction' });
    this.bus.subscribe(EVENT_TYPES.STANCE_CHANGE, this.onStanceChangeEvent, { name: 'DebateManager:stance' });
  }

  get phase(): DebatePhase {
    return this.debatePhase;
  }

  get debateInProgress(): boolean {
    return this.debatePhase === DEBATE_PHASES.IN_PROGRESS;
  }

  get currentTopic(): string | null {
    return this.topic;
  }

  get currentSpeaker(): Senator | null {
    return this.speaker;
  }

  /** Senators still waiting for the floor, in order. */
  get speakerQueue(): readonly Senator[] {
    return [...this.queue];
  }

  async startDebate(topic: string, senators: readonly Senator[]): Promise<TransitionResult> {
    if (this.debateInProgress) {
      return this.reject('Debate already in progress', { topic: this.topic ?? undefined });
    }
    const startedAt = this.now();
    this.topic = topic;
    this.speaker = null;
    this.queue = [];
    this.participants = [];
    senators.forEach((senator) => this.enqueue(senator));
    this.stats = {
      debateId: generateDebateId(startedAt),
      startedAt,
      speechCounts: new Map(this.participants.map((s): [string, number] => [s.name, 0])),
      rulings: [],
      reactions: 0,
      stanceChanges: 0,
    };
    this.debatePhase = DEBATE_PHASES.IN_PROGRESS;

    this.logger.info('Debate started', { topic, participants: this.participants.length });
    this.notify('onDebateStart', () => this.hooks.onDebateStart?.(topic, [...this.participants]));
    await this.bus.publish(
      createDebateEvent({
        subtype: DEBATE_EVENT_SUBTYPES.DEBATE_START,
        topic,
        participants: this.participants.map((s) => s.name),
      })
    );
    return { accepted: true };
  }

  /**
   * Appends a senator to the speaker queue. Returns false if it is already queued.
   */
  registerSpeaker(senator: Senator): boolean {
    const added = this.enqueue(senator);
    if (added && this.stats && !this.stats.speechCounts.has(senator.name)) {
      this.stats.speechCounts.set(senator.name, 0);
    }
    return added;
  }

  /**
   * Gives the floor to the head of the queue. Returns undefined when no debate is running
   * or the queue is empty.
   */
  async nextSpeaker(): Promise<Senator | undefined> {
    const topic = this.topic;
    if (!this.debateInProgress || topic === null) {
      this.logger.warn('No debate in progress; cannot change speaker');
      return undefined;
    }
    const next = this.queue.shift();
    if (next === undefined) return undefined;

    this.speaker = next;
    this.logger.debug('Speaker recognized', { speaker: next.name, rank: next.rank });
    this.notify('onSpeakerChange', () => this.hooks.onSpeakerChange?.(next));
    await this.bus.publish(
      createDebateEvent({
        subtype: DEBATE_EVENT_SUBTYPES.SPEAKER_CHANGE,
        topic,
        participants: this.participants.map((s) => s.name),
        speaker: next,
      })
    );
    return next;
  }

  /**
   * Publishes a speech. The speaker need not hold the floor; listeners treat an
   * out-of-turn speech as a breach of order.
   */
  async publishSpeech(
    speaker: Senator,
    topic: string,
    content: BilingualText,
    stance: Stance,
    keyPoints: readonly string[]
  ): Promise<SpeechResult> {
    if (!this.debateInProgress || !this.stats) {
      return this.reject('No debate in progress; speech discarded', { speaker: speaker.name });
    }
    const event = createSpeechEvent({ speaker, topic, content, stance, keyPoints });
    this.stats.speechCounts.set(speaker.name, (this.stats.speechCounts.get(speaker.name) ?? 0) + 1);
    this.notify('onSpeech', () => this.hooks.onSpeech?.(event));
    await this.bus.publish(event);
    return { accepted: true, event };
  }

  /**
   * Rules on an interjection against the senator currently holding the floor.
   * Returns undefined when there is no debate or no speaker to interrupt.
   */
  handleInterjection(event: InterjectionEvent): InterjectionRuling | undefined {
    const speaker = this.speaker;
    if (!this.debateInProgress || !this.stats || speaker === null) {
      this.logger.warn('Interjection discarded: no speaker holds the floor', {
        eventId: event.id,
        interjector: event.interjector.name,
      });
      return undefined;
    }

    const interjectorRank = event.interjector.rank;
    const allowed = canInterrupt(interjectorRank, speaker.rank, event.interjectionType);
    const reason = !allowed
      ? 'Insufficient rank'
      : interjectorRank > speaker.rank
        ? 'Outranks the speaker'
        : 'Point of order from an equal';
    const ruling: InterjectionRuling = {
      eventId: event.id,
      interjector: event.interjector.name,
      speaker: speaker.name,
      interjectionType: event.interjectionType,
      allowed,
      disrupted: allowed && event.causesDisruption,
      reason,
    };
    this.stats.rulings.push(ruling);

    const fields = {
      eventId: event.id,
      interjector: event.interjector.name,
      speaker: speaker.name,
      type: event.interjectionType,
    };
    if (allowed) {
      this.logger.info(ruling.disrupted ? 'Interjection disrupts the speech' : 'Interjection allowed', fields);
      this.notify('onInterjection', () => this.hooks.onInterjection?.(event));
    } else {
      // Denied interjections stay in the rulings and are not shown.
      this.logger.debug('Interjection denied', fields);
    }
    return ruling;
  }

  handleReaction(event: ReactionEvent): void {
    if (this.debateInProgress && this.stats) this.stats.reactions++;
    this.logger.debug('Reaction', {
      eventId: event.id,
      reactor: event.reactor.name,
      type: event.reactionType,
      target: event.targetEventId,
    });
    this.notify('onReaction', () => this.hooks.onReaction?.(event));
  }

  /**
   * Moves the debate to a new topic and publishes TOPIC_CHANGE.
   */
  async changeTopic(newTopic: string): Promise<TransitionResult> {
    const previousTopic = this.topic;
    if (!this.debateInProgress || previousTopic === null) {
      return this.reject('No debate in progress; cannot change topic', { topic: newTopic });
    }
    if (previousTopic === newTopic) {
      return this.reject('Topic unchanged', { topic: newTopic });
    }
    this.topic = newTopic;
    await this.bus.publish(
      createDebateEvent({
        subtype: DEBATE_EVENT_SUBTYPES.TOPIC_CHANGE,
        topic: newTopic,
        participants: this.participants.map((s) => s.name),
        previousTopic,
      })
    );
    return { accepted: true };
  }

  async endDebate(): Promise<EndResult> {
    const topic = this.topic;
    if (!this.debateInProgress || topic === null || !this.stats) {
      return this.reject('No debate in progress; nothing to end');
    }
    const summary = this.buildSummary(topic, this.stats);
    this.topic = null;
    this.speaker = null;
    this.queue = [];
    this.debatePhase = DEBATE_PHASES.ENDED;

    await this.bus.publish(
      createDebateEvent({
        subtype: DEBATE_EVENT_SUBTYPES.DEBATE_END,
        topic,
        participants: summary.participants,
      })
    );
    this.logger.info('Debate ended', { topic, speeches: summary.totalSpeeches, durationMs: summary.durationMs });
    this.notify('onDebateEnd', () => this.hooks.onDebateEnd?.(summary));
    return { accepted: true, summary };
  }

  /**
   * Runs a whole debate: every senator speaks once, in order, then the debate ends.
   * A speech the generator fails to deliver in time is skipped and reported.
   */
  async conductDebate(topic: string, senators: readonly Senator[], options: ConductOptions): Promise<ConductResult> {
    const started = await this.startDebate(topic, senators);
    if (!started.accepted) return started;

    const timeoutMs = options.generatorTimeoutMs ?? DEFAULT_GENERATOR_TIMEOUT_MS;
    const pauseMs = options.pauseMs ?? DEFAULT_PAUSE_MS;
    const speeches: SpeechEvent[] = [];
    const failures: SpeechFailure[] = [];

    for (let speaker = await this.nextSpeaker(); speaker !== undefined; speaker = await this.nextSpeaker()) {
      const speechTopic = this.topic ?? topic;
      let generated: GeneratedSpeech;
      try {
        const stanceHint = options.stanceOf?.(speaker, speechTopic);
        generated = await withTimeout(
          options.generator.generate({
            senator: speaker,
            topic: speechTopic,
            ...(stanceHint !== undefined && { stanceHint }),
            priorSpeeches: [...speeches],
          }),
          timeoutMs,
          `Speech generation for ${speaker.name}`
        );
      } catch (error: unknown) {
        const failure = error instanceof Error ? error : new Error(String(error));
        failures.push({ speaker: speaker.name, error: getErrorMessage(error) });
        this.logger.warn('Speech generation failed', { speaker: speaker.name, error: failure.message });
        this.notify('onSpeechFailed', () => this.hooks.onSpeechFailed?.(speaker, failure));
        continue;
      }

      const result = await this.publishSpeech(speaker, speechTopic, generated.content, generated.stance, generated.keyPoints);
      if (!result.accepted) break;
      speeches.push(result.event);
      await delay(pauseMs);
    }

    const ended = await this.endDebate();
    if (!ended.accepted) return ended;
    return { accepted: true, summary: ended.summary, speeches, failures };
  }

  /** Unsubscribes from the bus. */
  dispose(): void {
    this.bus.unsubscribe(EVENT_TYPES.INTERJECTION, this.onInterjectionEvent);
    this.bus.unsubscribe(EVENT_TYPES.REACTION, this.onReactionEvent);
    this.bus.unsubscribe(EVENT_TYPES.STANCE_CHANGE, this.onStanceChangeEvent);
  }

  private readonly onInterjectionEvent = (event: InterjectionEvent): void => {
    this.handleInterjection(event);
  };

  private readonly onReactionEvent = (event: ReactionEvent): void => {
    this.handleReaction(event);
  };

  private readonly onStanceChangeEvent = (event: StanceChangeEvent): void => {
    if (this.debateInProgress && this.stats) this.stats.stanceChanges++;
    this.logger.debug('Stance changed', {
      senator: event.senator.name,
      topic: event.topic,
      from: event.oldStance,
      to: event.newStance,
    });
    this.notify('onStanceChange', () => this.hooks.onStanceChange?.(event));
  };

  private enqueue(senator: Senator): boolean {
    if (this.queue.some((s) => s.id === senator.id)) return false;
    this.queue.push(senator);
    if (!this.participants.some((s) => s.id === senator.id)) {
      this.participants.push(senator);
    }
    return true;
  }

  /** Runs a display hook; a hook that throws is logged and never interrupts the debate. */
  private notify(hook: keyof DebateHooks, call: () => void): void {
    try {
      call();
    } catch (error: unknown) {
      this.logger.warn('Debate hook failed', { hook, error: getErrorMessage(error) });
    }
  }

  private reject(reason: string, fields?: Record<string, string | undefined>): Rejected {
    this.logger.warn(reason, fields);
    return rejected(reason);
  }

  private buildSummary(topic: string, stats: DebateStats): DebateSummary {
    const endedAt = this.now();
    const speechCounts = Object.fromEntries(stats.speechCounts);
    let mostActiveSpeaker: string | null = null;
    let most = 0;
    for (const [name, count] of stats.speechCounts) {
      if (count > most) {
        most = count;
        mostActiveSpeaker = name;
      }
    }
    const allowed = stats.rulings.filter((r) => r.allowed).length;
    return {
      debateId: stats.debateId,
      topic,
      participants: this.participants.map((s) => s.name),
      startedAt: stats.startedAt.toISOString(),
      endedAt: endedAt.toISOString(),
      durationMs: endedAt.getTime() - stats.startedAt.getTime(),
      speechCounts,
      totalSpeeches: [...stats.speechCounts.values()].reduce((sum, n) => sum + n, 0),
      mostActiveSpeaker,
      interjections: {
        allowed,
        denied: stats.rulings.length - allowed,
        rulings: [...stats.rulings],
      },
      reactions: stats.reactions,
      stanceChanges: stats.stanceChanges,
    };
  }
}
