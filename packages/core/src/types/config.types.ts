import type { DecisionConfig } from '../agents/decision-model';
import type { LlmProviderType } from '../providers/llm-provider';

import { Senator, Stance } from './senate.types';

/** Default configuration file name, resolved against the working directory. */
export const DEFAULT_CONFIG_FILE = 'senate-config.json';

/**
 * A senator entry of the configuration file.
 */
export interface SenatorConfig extends Senator {
  stances?: Record<string, Stance>; // Initial stance per topic.
}

export interface DebateSettings {
  historySize?: number; // Event bus history capacity.
  pauseMs?: number; // Pause after each speech.
  generatorTimeoutMs?: number; // Limit on generating one speech; 0 disables it.
}

export interface LlmSettings {
  provider: LlmProviderType;
  model?: string;
  temperature?: number;
}

/**
 * Top-level structure of the senate configuration file.
 *
 * @property senators - Roster in speaking order.
 * @property debate - (Optional) Engine settings.
 * @property decision - (Optional) Overrides of the senator decision constants.
 * @property llm - (Optional) Language model used to write speeches; without it speeches come from templates.
 */
export interface SenateConfig {
  senators: SenatorConfig[];
  debate?: DebateSettings;
  decision?: Partial<DecisionConfig>;
  llm?: LlmSettings;
}
