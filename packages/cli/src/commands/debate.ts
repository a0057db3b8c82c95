import fs from 'fs';
import path from 'path';

import { Command } from 'commander';
import {
  AgentMemory,
  ContentGenerator,
  createProvider,
  createSeededRandom,
  createValidationError,
  DebateHooks,
  DebateManager,
  DebateSummary,
  DEFAULT_CONFIG_FILE,
  DEFAULT_RANDOM,
  ErrorWithCode,
  EventBus,
  EXIT_GENERAL_ERROR,
  EXIT_PROVIDER_ERROR,
  LlmContentGenerator,
  loadEnvironmentFile,
  Logger,
  MemorySnapshot,
  parseSenateConfig,
  RandomSource,
  readJsonFile,
  SenateConfig,
  Senator,
  SenatorAgent,
  SenateEvent,
  TemplateContentGenerator,
  writeFileWithDirectories,
  writeStderr,
} from 'curia-core';

import { infoUser, warnUser } from '../index';
import { DebateProgressUI } from '../utils/progress-ui';
import {
  formatInterjection,
  formatReaction,
  formatSpeech,
  formatStanceChange,
  formatSummary,
} from '../utils/transcript';

const JSON_INDENT_SPACES = 2;

interface DebateCommandOptions {
  config?: string;
  seed?: string;
  offline?: boolean;
  output?: string;
  envFile?: string;
  verbose?: boolean;
}

/**
 * JSON transcript written by `--output`.
 */
export interface DebateTranscript {
  summary: DebateSummary;
  failures: { speaker: string; error: string }[];
  events: SenateEvent[];
  memories: Record<string, MemorySnapshot>;
}

/**
 * Roster used when no configuration file is present.
 */
export function builtInDefaults(): SenateConfig {
  return {
    senators: [
      { id: 'cato', name: 'Cato', faction: 'Optimates', rank: 4 },
      { id: 'cicero', name: 'Cicero', faction: 'Optimates', rank: 3 },
      { id: 'clodius', name: 'Clodius', faction: 'Populares', rank: 2 },
    ],
  };
}

/**
 * Loads and validates the senate configuration.
 *
 * Without an explicit path, a missing ./senate-config.json falls back to the built-in roster
 * with a warning. An explicit path that does not exist is an error.
 *
 * @throws {ErrorWithCode} EXIT_INVALID_ARGS for an unreadable file, EXIT_CONFIG_ERROR for invalid content.
 */
export function loadConfig(configPath?: string): SenateConfig {
  if (configPath === undefined) {
    const defaultPath = path.resolve(process.cwd(), DEFAULT_CONFIG_FILE);
    if (!fs.existsSync(defaultPath)) {
      warnUser(`Config not found at ${defaultPath}. Using built-in defaults.`);
      return builtInDefaults();
    }
    return parseSenateConfig(readJsonFile(defaultPath, 'Config file'));
  }
  return parseSenateConfig(readJsonFile(configPath, 'Config file'));
}

function randomFor(seed: string | undefined, stream: string): RandomSource {
  return seed === undefined ? DEFAULT_RANDOM : createSeededRandom(`${seed}:${stream}`);
}

/**
 * Template speeches offline or when no model is configured; otherwise the configured model.
 */
function createContentGenerator(config: SenateConfig, options: DebateCommandOptions): ContentGenerator {
  const llm = config.llm;
  if (options.offline || llm === undefined) {
    if (!options.offline) infoUser('No llm configured; speeches will come from templates');
    return new TemplateContentGenerator(randomFor(options.seed, 'speeches'));
  }
  const provider = createProvider(llm.provider);
  return new LlmContentGenerator(provider, {
    ...(llm.model !== undefined && { model: llm.model }),
    ...(llm.temperature !== undefined && { temperature: llm.temperature }),
  });
}

/**
 * Hooks writing the transcript to stdout and progress to stderr.
 */
function createDebateHooks(progressUI: DebateProgressUI): DebateHooks {
  const out = (text: string): void => {
    process.stdout.write(`${text}\n`);
  };
  return {
    onDebateStart: (topic, participants) => progressUI.debateStarted(topic, participants),
    onSpeakerChange: (speaker) => progressUI.speakerRecognized(speaker),
    onSpeech: (event) => out(formatSpeech(event)),
    onReaction: (event) => out(formatReaction(event)),
    onInterjection: (event) => out(formatInterjection(event)),
    onStanceChange: (event) => out(formatStanceChange(event)),
    onDebateEnd: (summary) => {
      out(formatSummary(summary));
      progressUI.complete(summary);
    },
    onSpeechFailed: (speaker, error) => progressUI.speechFailed(speaker, error),
  };
}

function toSenator(entry: Senator): Senator {
  return { id: entry.id, name: entry.name, faction: entry.faction, rank: entry.rank };
}

/**
 * Runs one debate on `topic` with the given configuration. Returns the JSON transcript.
 */
export async function runDebate(topic: string, config: SenateConfig, options: DebateCommandOptions): Promise<DebateTranscript> {
  const verbose = options.verbose ?? false;
  const logger = new Logger(verbose);
  const bus = new EventBus({
    ...(config.debate?.historySize !== undefined && { maxHistory: config.debate.historySize }),
    logger,
  });

  const senators = config.senators.map(toSenator);
  const agents = config.senators.map(
    (entry) =>
      new SenatorAgent(toSenator(entry), {
        bus,
        random: randomFor(options.seed, entry.id),
        ...(config.decision !== undefined && { decision: config.decision }),
        ...(entry.stances !== undefined && { stances: entry.stances }),
        memory: new AgentMemory(),
        logger,
      })
  );
  const agentsById = new Map(agents.map((agent): [string, SenatorAgent] => [agent.senator.id, agent]));

  const generator = createContentGenerator(config, options);
  const progressUI = new DebateProgressUI();
  progressUI.initialize(senators.length);
  const manager = new DebateManager({ bus, hooks: createDebateHooks(progressUI), logger });

  try {
    const result = await manager.conductDebate(topic, senators, {
      generator,
      ...(config.debate?.pauseMs !== undefined && { pauseMs: config.debate.pauseMs }),
      ...(config.debate?.generatorTimeoutMs !== undefined && { generatorTimeoutMs: config.debate.generatorTimeoutMs }),
      stanceOf: (senator, speechTopic) => agentsById.get(senator.id)?.currentStance(speechTopic),
    });
    if (!result.accepted) {
      throw createValidationError(result.reason, EXIT_GENERAL_ERROR);
    }
    if (result.speeches.length === 0 && result.failures.length > 0) {
      throw createValidationError(`No speech could be generated: ${result.failures[0].error}`, EXIT_PROVIDER_ERROR);
    }

    const memories: Record<string, MemorySnapshot> = {};
    for (const agent of agents) memories[agent.senator.name] = agent.memory.toSnapshot();
    return { summary: result.summary, failures: result.failures, events: bus.getRecentEvents(), memories };
  } finally {
    agents.forEach((agent) => agent.dispose());
    manager.dispose();
  }
}

export function debateCommand(program: Command): void {
  program
    .command('debate')
    .argument('<topic>', 'Question put before the Senate')
    .option('-c, --config <path>', `Path to configuration file (default ./${DEFAULT_CONFIG_FILE})`)
    .option('-s, --seed <seed>', 'Seed for reproducible senator decisions')
    .option('--offline', 'Use template speeches instead of a language model')
    .option('-o, --output <path>', 'Write a JSON transcript (summary, events, memories) to this file')
    .option('-e, --env-file <path>', 'Path to environment file (default: .env)')
    .option('-v, --verbose', 'Verbose output')
    .action(async (topic: string, options: DebateCommandOptions): Promise<void> => {
      try {
        loadEnvironmentFile(options.envFile, options.verbose);
        const config = loadConfig(options.config);

        infoUser(`Convening the Senate on "${topic}"`);
        const transcript = await runDebate(topic, config, options);

        if (options.output) {
          const written = await writeFileWithDirectories(
            options.output,
            JSON.stringify(transcript, null, JSON_INDENT_SPACES)
          );
          infoUser(`Saved transcript to ${written}`);
        }
      } catch (err: unknown) {
        const errorWithCode: ErrorWithCode = err instanceof Error ? err : new Error(String(err));
        const code = typeof errorWithCode.code === 'number' ? errorWithCode.code : EXIT_GENERAL_ERROR;
        writeStderr(`${errorWithCode.message}\n`);
        throw Object.assign(new Error(errorWithCode.message), { code });
      }
    });
}
