/**
 * Graph execution engine for model-backed agent workflows.
 */

export * from './services/arium';
export * from './services/llm/modelClient';
export * from './services/llm/openaiClient';
export * from './types/messageTypes';
export * from './types/planTypes';
export * from './middleware/errors';
export * from './config/settings';
export * from './config/llmConfig';
export { createLogger, defaultLogLevel } from './utils/logger';
export type { LoggerOptions } from './utils/logger';
export * from './utils/metrics';
export * from './utils/observability';
export * from './utils/timeout';
