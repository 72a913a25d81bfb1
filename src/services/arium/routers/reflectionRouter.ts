import type winston from 'winston';
import defaultLogger from '../../../utils/logger';
import { getLLMConfig } from '../../../config/llmConfig';
import { ConfigurationError, RoutingError } from '../../../middleware/errors';
import { ModelClient } from '../../llm/modelClient';
import { describeMessage } from '../messages';
import { Router, RouterMemory, RoutingContext } from '../types';

export interface ReflectionRouterOptions {
  /** Node order to enforce, e.g. [main, critic, main, final] */
  flowPattern: string[];
  /** Let the model skip straight to the final stage */
  allowEarlyExit?: boolean;
  client?: ModelClient;
  logger?: winston.Logger;
}

/**
 * Drives a fixed reflection loop. The expected next node is found by
 * consuming the run's visit counts against the pattern; once the pattern is
 * exhausted the final stage is chosen.
 */
export class ReflectionRouter {
  readonly flowPattern: readonly string[];
  readonly allowEarlyExit: boolean;
  private readonly client?: ModelClient;
  private readonly logger: winston.Logger;

  constructor(options: ReflectionRouterOptions) {
    if (options.flowPattern.length === 0) {
      throw new ConfigurationError('Reflection router needs a non-empty flow pattern');
    }
    this.flowPattern = [...options.flowPattern];
    this.allowEarlyExit = options.allowEarlyExit ?? false;
    this.client = options.client;
    this.logger = options.logger ?? defaultLogger;
  }

  get finalStage(): string {
    return this.flowPattern[this.flowPattern.length - 1];
  }

  expectedNext(visitCounts: ReadonlyMap<string, number>): string {
    const remaining = new Map(visitCounts);
    for (const node of this.flowPattern) {
      const visits = remaining.get(node) ?? 0;
      if (visits === 0) {
        return node;
      }
      remaining.set(node, visits - 1);
    }
    return this.finalStage;
  }

  async route(memory: RouterMemory, context: RoutingContext): Promise<string> {
    let next = this.expectedNext(context.visitCounts);

    if (this.allowEarlyExit && this.client && next !== this.finalStage && context.candidates.includes(this.finalStage)) {
      next = await this.decideEarlyExit(memory, next);
    }

    if (!context.candidates.includes(next)) {
      throw new RoutingError(`Reflection pattern expects ${next} after ${context.currentNode}`, {
        fromNode: context.currentNode,
        chosen: next,
        candidates: [...context.candidates],
      });
    }

    this.logger.debug('Reflection router step', { from: context.currentNode, to: next });
    return next;
  }

  private async decideEarlyExit(memory: RouterMemory, expected: string): Promise<string> {
    if (!this.client) return expected;
    const conversation = memory.read().slice(-5).map(describeMessage).join('\n');
    const prompt = `You are supervising a reflection workflow following the pattern ${this.flowPattern.join(' -> ')}.

Recent conversation:
${conversation}

The next step in the pattern is "${expected}". If the work is already good enough, the workflow may skip to "${this.finalStage}".
Respond with ONLY one name: ${expected} or ${this.finalStage}.`;

    const response = await this.client.generate([{ role: 'user', content: prompt }], {
      temperature: getLLMConfig('routing').temperature,
      maxTokens: getLLMConfig('routing').maxTokens,
    });
    const answer = response.content.trim().toLowerCase();
    if (answer === this.finalStage.toLowerCase()) {
      this.logger.info('Reflection router exiting early', { to: this.finalStage });
      return this.finalStage;
    }
    return expected;
  }

  asRouter(): Router {
    return (memory, context) => this.route(memory, context);
  }
}
