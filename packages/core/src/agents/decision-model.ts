import {
  ALL_REACTION_TYPES,
  INTERJECTION_TYPES,
  InterjectionType,
  REACTION_TYPES,
  ReactionType,
} from '../types/event.types';
import { Stance, STANCES } from '../types/senate.types';
import { clamp } from '../utils/common';

import { pick, RandomSource, Weighted, weightedPick } from './random-source';

/**
 * Tunable constants of the senator decision formulas.
 */
export interface DecisionConfig {
  reactionBase: number;
  reactionRelationshipWeight: number;
  reactionFactionBonus: number;
  reactionTopicInterestMax: number; // Upper bound (exclusive) of the random topic-interest term.
  reactionCap: number;

  interjectionBase: number;
  interjectionRelationshipWeight: number;
  interjectionRankWeight: number;
  interjectionRankCap: number;
  interjectionStanceBonus: number; // Added when the listener's stance differs from the speech.
  interjectionCap: number;

  stanceChangeBase: number;
  stanceChangeRelationshipWeight: number;
  stanceChangeFactionBonus: number;
  stanceChangeRankWeight: number;
  stanceChangeRankCap: number;
  stanceChangeCap: number;

  affinityThreshold: number; // |relationship| above which reactions and interjections lean by polarity.
}

export const DEFAULT_DECISION_CONFIG: Readonly<DecisionConfig> = Object.freeze({
  reactionBase: 0.3,
  reactionRelationshipWeight: 0.2,
  reactionFactionBonus: 0.1,
  reactionTopicInterestMax: 0.3,
  reactionCap: 0.8,

  interjectionBase: 0.1,
  interjectionRelationshipWeight: 0.15,
  interjectionRankWeight: 0.05,
  interjectionRankCap: 0.2,
  interjectionStanceBonus: 0.15,
  interjectionCap: 0.5,

  stanceChangeBase: 0.05,
  stanceChangeRelationshipWeight: 0.1,
  stanceChangeFactionBonus: 0.05,
  stanceChangeRankWeight: 0.025,
  stanceChangeRankCap: 0.1,
  stanceChangeCap: 0.3,

  affinityThreshold: 0.3,
});

export function isDecisionConfigKey(key: string): key is keyof DecisionConfig {
  return Object.prototype.hasOwnProperty.call(DEFAULT_DECISION_CONFIG, key);
}

export function resolveDecisionConfig(overrides: Partial<DecisionConfig> = {}): DecisionConfig {
  return { ...DEFAULT_DECISION_CONFIG, ...overrides };
}

/** Relationship score deltas applied by a listener after it reacts or interjects. */
export const RELATIONSHIP_IMPACTS = {
  AGREEMENT: 0.05,
  DISAGREEMENT: -0.05,
  SUPPORT: 0.1,
  CHALLENGE: -0.1,
  EMOTIONAL: -0.2,
} as const;

export function reactionImpact(type: ReactionType): number {
  if (type === REACTION_TYPES.AGREEMENT) return RELATIONSHIP_IMPACTS.AGREEMENT;
  if (type === REACTION_TYPES.DISAGREEMENT) return RELATIONSHIP_IMPACTS.DISAGREEMENT;
  return 0;
}

export function interjectionImpact(type: InterjectionType): number {
  switch (type) {
    case INTERJECTION_TYPES.SUPPORT:
      return RELATIONSHIP_IMPACTS.SUPPORT;
    case INTERJECTION_TYPES.CHALLENGE:
      return RELATIONSHIP_IMPACTS.CHALLENGE;
    case INTERJECTION_TYPES.EMOTIONAL:
      return RELATIONSHIP_IMPACTS.EMOTIONAL;
    default:
      return 0;
  }
}

/**
 * Listener's stance relative to a speech. `unknown` when the listener holds no stance.
 */
export type StanceAlignment = 'agree' | 'disagree' | 'unknown';

export function alignmentOf(own: Stance | undefined, speech: Stance): StanceAlignment {
  if (own === undefined) return 'unknown';
  return own === speech ? 'agree' : 'disagree';
}

export interface ReactionInputs {
  relationship: number;
  sameFaction: boolean;
  topicInterest: number; // Random term in [0, reactionTopicInterestMax).
}

/**
 * Faction affinity amplifies a relationship of the matching polarity: allies who like the
 * speaker and rivals who dislike them are both more likely to react.
 */
export function reactionProbability(inputs: ReactionInputs, config: DecisionConfig = DEFAULT_DECISION_CONFIG): number {
  const { relationship, sameFaction, topicInterest } = inputs;
  const factionFactor =
    (sameFaction && relationship >= 0) || (!sameFaction && relationship < 0) ? config.reactionFactionBonus : 0;
  const raw = config.reactionBase + Math.abs(relationship) * config.reactionRelationshipWeight + factionFactor + topicInterest;
  return clamp(raw, 0, config.reactionCap);
}

export interface InterjectionInputs {
  relationship: number;
  rank: number; // Rank of the would-be interjector.
  stanceDiffers: boolean;
}

export function interjectionProbability(
  inputs: InterjectionInputs,
  config: DecisionConfig = DEFAULT_DECISION_CONFIG
): number {
  const rankFactor = Math.min(config.interjectionRankCap, inputs.rank * config.interjectionRankWeight);
  const raw =
    config.interjectionBase +
    Math.abs(inputs.relationship) * config.interjectionRelationshipWeight +
    rankFactor +
    (inputs.stanceDiffers ? config.interjectionStanceBonus : 0);
  return clamp(raw, 0, config.interjectionCap);
}

export interface StanceChangeInputs {
  relationship: number;
  sameFaction: boolean;
  speakerRank: number;
}

/** Only goodwill persuades; a negative relationship contributes nothing. */
export function stanceChangeProbability(
  inputs: StanceChangeInputs,
  config: DecisionConfig = DEFAULT_DECISION_CONFIG
): number {
  const raw =
    config.stanceChangeBase +
    Math.max(0, inputs.relationship) * config.stanceChangeRelationshipWeight +
    (inputs.sameFaction ? config.stanceChangeFactionBonus : 0) +
    Math.min(config.stanceChangeRankCap, inputs.speakerRank * config.stanceChangeRankWeight);
  return clamp(raw, 0, config.stanceChangeCap);
}

export function chooseReactionType(
  random: RandomSource,
  relationship: number,
  alignment: StanceAlignment,
  config: DecisionConfig = DEFAULT_DECISION_CONFIG
): ReactionType {
  if (relationship > config.affinityThreshold && alignment === 'agree') {
    return pick(random, [REACTION_TYPES.AGREEMENT, REACTION_TYPES.INTEREST]);
  }
  if (relationship < -config.affinityThreshold && alignment === 'disagree') {
    return pick(random, [REACTION_TYPES.DISAGREEMENT, REACTION_TYPES.SKEPTICISM]);
  }
  return pick(random, ALL_REACTION_TYPES);
}

export function interjectionWeights(
  relationship: number,
  rank: number,
  alignment: StanceAlignment,
  config: DecisionConfig = DEFAULT_DECISION_CONFIG
): Weighted<InterjectionType>[] {
  const senior = rank > 2;
  if (relationship > config.affinityThreshold) {
    return [
      [INTERJECTION_TYPES.SUPPORT, 0.5],
      [INTERJECTION_TYPES.INFORMATIONAL, 0.3],
      [INTERJECTION_TYPES.CHALLENGE, 0.1],
      [INTERJECTION_TYPES.PROCEDURAL, senior ? 0.1 : 0],
      [INTERJECTION_TYPES.EMOTIONAL, 0],
    ];
  }
  if (relationship < -config.affinityThreshold) {
    return [
      [INTERJECTION_TYPES.CHALLENGE, 0.5],
      [INTERJECTION_TYPES.EMOTIONAL, 0.2],
      [INTERJECTION_TYPES.PROCEDURAL, senior ? 0.2 : 0.1],
      [INTERJECTION_TYPES.INFORMATIONAL, 0.1],
      [INTERJECTION_TYPES.SUPPORT, 0],
    ];
  }
  return [
    [INTERJECTION_TYPES.INFORMATIONAL, 0.3],
    [INTERJECTION_TYPES.CHALLENGE, alignment === 'disagree' ? 0.2 : 0.1],
    [INTERJECTION_TYPES.SUPPORT, alignment === 'agree' ? 0.2 : 0.1],
    [INTERJECTION_TYPES.PROCEDURAL, senior ? 0.2 : 0.1],
    [INTERJECTION_TYPES.EMOTIONAL, 0.1],
  ];
}

export interface InterjectionTypeInputs {
  relationship: number;
  rank: number;
  alignment: StanceAlignment;
  outOfOrder: boolean; // Speaker is not the recognized speaker, or the speech is off the active topic.
}

/**
 * Out-of-order speeches always draw a point of order; otherwise the type is a weighted draw.
 */
export function chooseInterjectionType(
  random: RandomSource,
  inputs: InterjectionTypeInputs,
  config: DecisionConfig = DEFAULT_DECISION_CONFIG
): InterjectionType {
  if (inputs.outOfOrder) return INTERJECTION_TYPES.PROCEDURAL;
  return weightedPick(random, interjectionWeights(inputs.relationship, inputs.rank, inputs.alignment, config));
}

/**
 * The stance a persuaded listener moves to, or undefined when it already agrees.
 * A neutral listener adopts the speaker's stance; a listener on the other side moves to neutral.
 */
export function resolveStanceShift(current: Stance, speakerStance: Stance): Stance | undefined {
  if (current === speakerStance) return undefined;
  return current === STANCES.NEUTRAL ? speakerStance : STANCES.NEUTRAL;
}
