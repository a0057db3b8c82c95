// Types
export * from './types/senate.types';
export * from './types/event.types';
export * from './types/config.types';

// Events
export * from './events/event-factory';
export * from './events/event-bus';

// Memory
export * from './memory/memory.types';
export * from './memory/agent-memory';

// Agents
export * from './agents/random-source';
export * from './agents/decision-model';
export * from './agents/phrases';
export * from './agents/senator-agent';

// Debate
export * from './debate/debate.types';
export * from './debate/debate-manager';

// Content generation
export * from './content/content-generator';
export * from './content/template-content-generator';
export * from './content/speech-prompts';
export * from './content/llm-content-generator';

// Providers
export * from './providers/llm-provider';
export * from './providers/openai-provider';
export * from './providers/openrouter-provider';
export * from './providers/provider-factory';

// Utils
export * from './utils/exit-codes';
export * from './utils/common';
export * from './utils/console';
export * from './utils/logger';
export * from './utils/promise';
export * from './utils/id';
export * from './utils/env-loader';
export * from './utils/config-validation';
