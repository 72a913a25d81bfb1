/**
 * Observability handle passed explicitly into builders, graphs, nodes and
 * routers. There is no process-wide registry: whoever constructs a graph
 * decides which logger and metrics recorder it reports to.
 */
import type winston from 'winston';
import defaultLogger, { createLogger, LoggerOptions } from './logger';
import { MetricsRecorder } from './metrics';

export interface Observability {
  logger: winston.Logger;
  metrics: MetricsRecorder;
}

export function createObservability(
  options: LoggerOptions & { logger?: winston.Logger } = {},
): Observability {
  const logger = options.logger ?? createLogger(options);
  return { logger, metrics: new MetricsRecorder(logger) };
}

let fallback: Observability | null = null;

/**
 * Handle used when a caller supplies none. Built lazily on first use.
 */
export function defaultObservability(): Observability {
  fallback ??= { logger: defaultLogger, metrics: new MetricsRecorder(defaultLogger) };
  return fallback;
}
