import { isDecisionConfigKey, DecisionConfig } from '../agents/decision-model';
import { isLlmProviderType } from '../providers/llm-provider';
import { DebateSettings, LlmSettings, SenateConfig, SenatorConfig } from '../types/config.types';
import { isStance, Stance } from '../types/senate.types';

import { createValidationError, isRecord } from './common';
import { EXIT_CONFIG_ERROR } from './exit-codes';

const MAX_TEMPERATURE = 2;

function fail(message: string): never {
  throw createValidationError(`Invalid senate configuration: ${message}`, EXIT_CONFIG_ERROR);
}

function requireString(value: unknown, path: string): string {
  if (typeof value !== 'string' || value.trim() === '') fail(`${path} must be a non-empty string`);
  return value;
}

function optionalNumber(value: unknown, path: string, min: number, integer: boolean = false): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value) || value < min || (integer && !Number.isInteger(value))) {
    fail(`${path} must be ${integer ? 'an integer' : 'a number'} >= ${min}`);
  }
  return value;
}

function parseStances(value: unknown, path: string): Record<string, Stance> | undefined {
  if (value === undefined) return undefined;
  if (!isRecord(value)) fail(`${path} must be an object mapping topics to stances`);
  const stances: Record<string, Stance> = {};
  for (const [topic, stance] of Object.entries(value)) {
    if (!isStance(stance)) fail(`${path}["${topic}"] must be one of support, oppose, neutral`);
    stances[topic] = stance;
  }
  return stances;
}

function parseSenator(value: unknown, index: number): SenatorConfig {
  const path = `senators[${index}]`;
  if (!isRecord(value)) fail(`${path} must be an object`);
  const rank = value.rank;
  if (typeof rank !== 'number' || !Number.isInteger(rank) || rank < 0) {
    fail(`${path}.rank must be a non-negative integer`);
  }
  const senator: SenatorConfig = {
    id: requireString(value.id, `${path}.id`),
    name: requireString(value.name, `${path}.name`),
    faction: requireString(value.faction, `${path}.faction`),
    rank,
  };
  const stances = parseStances(value.stances, `${path}.stances`);
  if (stances) senator.stances = stances;
  return senator;
}

function parseDebateSettings(value: unknown): DebateSettings | undefined {
  if (value === undefined) return undefined;
  if (!isRecord(value)) fail('debate must be an object');
  const settings: DebateSettings = {};
  const historySize = optionalNumber(value.historySize, 'debate.historySize', 1, true);
  const pauseMs = optionalNumber(value.pauseMs, 'debate.pauseMs', 0);
  const generatorTimeoutMs = optionalNumber(value.generatorTimeoutMs, 'debate.generatorTimeoutMs', 0);
  if (historySize !== undefined) settings.historySize = historySize;
  if (pauseMs !== undefined) settings.pauseMs = pauseMs;
  if (generatorTimeoutMs !== undefined) settings.generatorTimeoutMs = generatorTimeoutMs;
  return settings;
}

function parseDecision(value: unknown): Partial<DecisionConfig> | undefined {
  if (value === undefined) return undefined;
  if (!isRecord(value)) fail('decision must be an object');
  const decision: Partial<DecisionConfig> = {};
  for (const [key, raw] of Object.entries(value)) {
    if (!isDecisionConfigKey(key)) fail(`decision.${key} is not a known decision constant`);
    const parsed = optionalNumber(raw, `decision.${key}`, 0);
    if (parsed === undefined) fail(`decision.${key} must be a number >= 0`);
    decision[key] = parsed;
  }
  return decision;
}

function parseLlmSettings(value: unknown): LlmSettings | undefined {
  if (value === undefined) return undefined;
  if (!isRecord(value)) fail('llm must be an object');
  if (!isLlmProviderType(value.provider)) fail('llm.provider must be "openai" or "openrouter"');
  const settings: LlmSettings = { provider: value.provider };
  if (value.model !== undefined) settings.model = requireString(value.model, 'llm.model');
  const temperature = optionalNumber(value.temperature, 'llm.temperature', 0);
  if (temperature !== undefined) {
    if (temperature > MAX_TEMPERATURE) fail(`llm.temperature must be <= ${MAX_TEMPERATURE}`);
    settings.temperature = temperature;
  }
  return settings;
}

/**
 * Validates parsed configuration JSON.
 *
 * @throws {ErrorWithCode} EXIT_CONFIG_ERROR naming the first offending field.
 */
export function parseSenateConfig(raw: unknown): SenateConfig {
  if (!isRecord(raw)) fail('root must be a JSON object');
  if (!Array.isArray(raw.senators) || raw.senators.length === 0) {
    fail('senators must be a non-empty array');
  }
  const senators = raw.senators.map((entry: unknown, index: number) => parseSenator(entry, index));
  const seen = new Set<string>();
  for (const senator of senators) {
    if (seen.has(senator.id)) fail(`duplicate senator id "${senator.id}"`);
    seen.add(senator.id);
  }

  const config: SenateConfig = { senators };
  const debate = parseDebateSettings(raw.debate);
  const decision = parseDecision(raw.decision);
  const llm = parseLlmSettings(raw.llm);
  if (debate) config.debate = debate;
  if (decision) config.decision = decision;
  if (llm) config.llm = llm;
  return config;
}
