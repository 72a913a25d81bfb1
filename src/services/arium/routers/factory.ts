import type winston from 'winston';
import { ConfigurationError } from '../../../middleware/errors';
import { ModelClient } from '../../llm/modelClient';
import { Router } from '../types';
import {
  ConversationAnalysisRouter,
  FallbackStrategy,
  RoutingOptions,
  SmartRouter,
  TaskCategory,
  TaskClassifierRouter,
} from './llmRouter';
import { PlanExecuteRouter } from './planExecuteRouter';
import { ReflectionRouter } from './reflectionRouter';

export type RouterType = 'smart' | 'task_classifier' | 'conversation_analysis' | 'reflection' | 'plan_execute';

interface LLMRouterParams {
  temperature?: number;
  maxRetries?: number;
  fallbackStrategy?: FallbackStrategy;
}

export type RouterParams =
  | ({ type: 'smart'; routingOptions: RoutingOptions; contextDescription?: string } & LLMRouterParams)
  | ({ type: 'task_classifier'; taskCategories: Record<string, TaskCategory> } & LLMRouterParams)
  | ({ type: 'conversation_analysis'; routingLogic: RoutingOptions; analysisDepth?: number } & LLMRouterParams)
  | { type: 'reflection'; flowPattern: string[]; allowEarlyExit?: boolean }
  | { type: 'plan_execute'; plannerNode: string; reviewerNode: string; executorNode?: string };

export interface RouterDependencies {
  /** Model used by LLM-backed routers and by reflection early exit */
  client?: ModelClient;
  logger?: winston.Logger;
}

function requireClient(type: RouterType, deps: RouterDependencies): ModelClient {
  if (!deps.client) {
    throw new ConfigurationError(`Router type ${type} needs a model client`);
  }
  return deps.client;
}

/**
 * Instantiate a built-in router from its type tag and parameters.
 */
export function createRouter(params: RouterParams, deps: RouterDependencies = {}): Router {
  const { logger } = deps;
  switch (params.type) {
    case 'smart':
      return new SmartRouter({ ...params, client: requireClient(params.type, deps), logger }).asRouter();
    case 'task_classifier':
      return new TaskClassifierRouter({ ...params, client: requireClient(params.type, deps), logger }).asRouter();
    case 'conversation_analysis':
      return new ConversationAnalysisRouter({
        ...params,
        client: requireClient(params.type, deps),
        logger,
      }).asRouter();
    case 'reflection':
      return new ReflectionRouter({ ...params, client: deps.client, logger }).asRouter();
    case 'plan_execute':
      return new PlanExecuteRouter({ ...params, logger }).asRouter();
  }
}
