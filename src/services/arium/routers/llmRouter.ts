/**
 * Routers that ask a language model which node should run next.
 */

import type winston from 'winston';
import defaultLogger from '../../../utils/logger';
import { getLLMConfig } from '../../../config/llmConfig';
import { ConfigurationError, errorMessage } from '../../../middleware/errors';
import { ModelClient } from '../../llm/modelClient';
import { describeMessage } from '../messages';
import { Router, RouterMemory, RoutingContext } from '../types';

export type FallbackStrategy = 'first' | 'last' | 'random';

export interface LLMRouterOptions {
  client: ModelClient;
  temperature?: number;
  maxRetries?: number;
  fallbackStrategy?: FallbackStrategy;
  logger?: winston.Logger;
  /** Source of randomness for the `random` fallback */
  random?: () => number;
}

/** Route name to the text the model sees for it */
export type RoutingOptions = Record<string, string>;

export abstract class BaseLLMRouter {
  protected readonly client: ModelClient;
  readonly temperature: number;
  readonly maxRetries: number;
  readonly fallbackStrategy: FallbackStrategy;
  protected readonly logger: winston.Logger;
  private readonly random: () => number;

  constructor(options: LLMRouterOptions) {
    this.client = options.client;
    this.temperature = options.temperature ?? getLLMConfig('routing').temperature;
    this.maxRetries = options.maxRetries ?? 3;
    this.fallbackStrategy = options.fallbackStrategy ?? 'first';
    this.logger = options.logger ?? defaultLogger;
    this.random = options.random ?? Math.random;
  }

  abstract getRoutingOptions(): RoutingOptions;

  abstract getRoutingPrompt(memory: RouterMemory, options: RoutingOptions, context?: RoutingContext): string;

  getFallbackRoute(options: RoutingOptions): string {
    const routes = Object.keys(options);
    switch (this.fallbackStrategy) {
      case 'last':
        return routes[routes.length - 1];
      case 'random':
        return routes[Math.floor(this.random() * routes.length)];
      default:
        return routes[0];
    }
  }

  /**
   * Match a model answer against the route names: exact first, then a route
   * name contained in the answer, then the answer contained in a route name.
   */
  matchDecision(answer: string, options: RoutingOptions): string | undefined {
    const decision = answer.trim().toLowerCase();
    if (!decision) return undefined;
    const names = Object.keys(options);
    return (
      names.find((name) => name.toLowerCase() === decision) ??
      names.find((name) => decision.includes(name.toLowerCase())) ??
      names.find((name) => name.toLowerCase().includes(decision))
    );
  }

  async route(memory: RouterMemory, context?: RoutingContext): Promise<string> {
    const options = this.getRoutingOptions();

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        const prompt = this.getRoutingPrompt(memory, options, context);
        const response = await this.client.generate([{ role: 'user', content: prompt }], {
          temperature: this.temperature,
          maxTokens: getLLMConfig('routing').maxTokens,
        });
        const choice = this.matchDecision(response.content, options);
        if (choice) {
          this.logger.info('LLM router selected route', { route: choice, attempt });
          return choice;
        }
        this.logger.warn('LLM router returned an unknown route', { attempt, answer: response.content });
      } catch (error) {
        this.logger.error('LLM router attempt failed', { attempt, error: errorMessage(error) });
      }
    }

    const fallback = this.getFallbackRoute(options);
    this.logger.warn('LLM router falling back', { strategy: this.fallbackStrategy, route: fallback });
    return fallback;
  }

  asRouter(): Router {
    return (memory, context) => this.route(memory, context);
  }
}

function assertRoutes(router: string, routes: Record<string, unknown>): void {
  if (Object.keys(routes).length === 0) {
    throw new ConfigurationError(`${router} needs at least one route`);
  }
}

function revisitWarnings(context: RoutingContext | undefined): string[] {
  if (!context) return [];
  return [...context.visitCounts]
    .filter(([, count]) => count >= 2)
    .map(([node, count]) => `- ${node}: visited ${count} times`);
}

export interface SmartRouterOptions extends LLMRouterOptions {
  routingOptions: RoutingOptions;
  contextDescription?: string;
}

export class SmartRouter extends BaseLLMRouter {
  readonly routingOptions: RoutingOptions;
  readonly contextDescription: string;

  constructor(options: SmartRouterOptions) {
    super(options);
    assertRoutes('SmartRouter', options.routingOptions);
    this.routingOptions = options.routingOptions;
    this.contextDescription = options.contextDescription ?? 'a multi-agent workflow';
  }

  getRoutingOptions(): RoutingOptions {
    return this.routingOptions;
  }

  getRoutingPrompt(memory: RouterMemory, options: RoutingOptions, context?: RoutingContext): string {
    const conversation = memory.read().slice(-5).map(describeMessage).join('\n');
    const optionsText = Object.entries(options)
      .map(([name, description]) => `- ${name}: ${description}`)
      .join('\n');
    const warnings = revisitWarnings(context);
    const contextInfo = warnings.length
      ? [
          '',
          'EXECUTION CONTEXT (avoid infinite loops):',
          `Current node: ${context?.currentNode ?? 'unknown'}`,
          'Node visit counts:',
          ...warnings,
          'Strongly prefer moving to a different node or completing the workflow.',
          '',
        ].join('\n')
      : '';

    return `You are a workflow coordinator for ${this.contextDescription}.

Based on the conversation history below, decide which agent should handle the next step.
${contextInfo}
Available agents:
${optionsText}

Recent conversation:
${conversation}

Instructions:
1. Analyze the conversation to understand what type of work is needed next
2. Choose the most appropriate agent from the available options
3. If you notice nodes being visited repeatedly, prefer different options or completion
4. Respond with ONLY the agent name (no explanations or additional text)

Agent to route to:`;
  }
}

export interface TaskCategory {
  description: string;
  keywords?: string[];
  examples?: string[];
}

export interface TaskClassifierRouterOptions extends LLMRouterOptions {
  taskCategories: Record<string, TaskCategory>;
}

export class TaskClassifierRouter extends BaseLLMRouter {
  readonly taskCategories: Record<string, TaskCategory>;

  constructor(options: TaskClassifierRouterOptions) {
    super(options);
    assertRoutes('TaskClassifierRouter', options.taskCategories);
    this.taskCategories = options.taskCategories;
  }

  getRoutingOptions(): RoutingOptions {
    return Object.fromEntries(
      Object.entries(this.taskCategories).map(([name, category]) => [name, category.description]),
    );
  }

  getRoutingPrompt(memory: RouterMemory, _options: RoutingOptions): string {
    const messages = memory.read();
    const latest = messages[messages.length - 1];
    const categories = Object.entries(this.taskCategories)
      .map(([name, category]) => {
        let detail = `- ${name}: ${category.description}`;
        if (category.keywords?.length) detail += `\n  Keywords: ${category.keywords.join(', ')}`;
        if (category.examples?.length) detail += `\n  Examples: ${category.examples.join(', ')}`;
        return detail;
      })
      .join('\n\n');

    return `You are a task classifier that routes requests to specialized agents.

Task to classify:
${latest ? describeMessage(latest) : '(no task)'}

Available categories:
${categories}

Instructions:
1. Analyze the task to understand what type of work it requires
2. Choose the most appropriate category from the available options
3. Consider keywords and examples to make the best match
4. Respond with ONLY the category name (no explanations)

Category:`;
  }
}

export interface ConversationAnalysisRouterOptions extends LLMRouterOptions {
  routingLogic: RoutingOptions;
  analysisDepth?: number;
}

export class ConversationAnalysisRouter extends BaseLLMRouter {
  readonly routingLogic: RoutingOptions;
  readonly analysisDepth: number;

  constructor(options: ConversationAnalysisRouterOptions) {
    super(options);
    assertRoutes('ConversationAnalysisRouter', options.routingLogic);
    this.routingLogic = options.routingLogic;
    this.analysisDepth = options.analysisDepth ?? 3;
  }

  getRoutingOptions(): RoutingOptions {
    return this.routingLogic;
  }

  getRoutingPrompt(memory: RouterMemory, options: RoutingOptions, context?: RoutingContext): string {
    const recent = memory
      .read()
      .slice(-this.analysisDepth)
      .map((message, index) => `Message ${index + 1}: ${describeMessage(message)}`)
      .join('\n');
    const logic = Object.entries(options)
      .map(([name, criteria]) => `- ${name}: ${criteria}`)
      .join('\n');
    const warnings = revisitWarnings(context);
    const contextInfo = warnings.length
      ? `\nExcessive node revisits detected:\n${warnings.join('\n')}\nConsider completing the workflow or choosing different paths.\n`
      : '';

    return `You are a conversation flow analyzer that determines the next step in a workflow.

Recent conversation (last ${this.analysisDepth} messages):
${recent}
${contextInfo}
Routing logic:
${logic}

Instructions:
1. Analyze the conversation flow and current state
2. Consider what has been accomplished and what needs to happen next
3. If nodes are being revisited too frequently, strongly prefer completion or different paths
4. Choose the route that best matches the current conversation state
5. Respond with ONLY the route name (no explanations)

Next route:`;
  }
}
