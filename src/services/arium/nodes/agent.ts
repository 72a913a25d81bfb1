/**
 * Agent node: a system prompt, a model client and optional tools.
 */

import type winston from 'winston';
import defaultLogger from '../../../utils/logger';
import { getLLMConfig } from '../../../config/llmConfig';
import { Message, NodeInput, Variables } from '../../../types/messageTypes';
import {
  ChatMessage,
  GenerateOptions,
  ModelClient,
  Tool,
  ToolCall,
  toToolDefinition,
} from '../../llm/modelClient';
import { createMessage, toMessage } from '../messages';
import { ExecutableNode, NodeRunContext, VariableConsumer } from '../types';
import { extractVariables, resolveVariables } from '../variables';

export type ReasoningPattern = 'direct' | 'cot' | 'react';

export interface AgentOptions {
  name: string;
  systemPrompt: string;
  client: ModelClient;
  role?: string;
  tools?: Tool[];
  reasoning?: ReasoningPattern;
  settings?: Omit<GenerateOptions, 'tools'>;
  /** Model round-trips allowed while the model keeps requesting tools */
  maxToolRounds?: number;
  inputFilter?: string[];
  logger?: winston.Logger;
}

const REASONING_INSTRUCTIONS: Record<ReasoningPattern, string> = {
  direct: '',
  cot: 'Think through the problem step by step before giving your final answer.',
  react:
    'Work in Thought / Action / Observation cycles: state your reasoning, call a tool when you need information, ' +
    'read the observation, and repeat until you can give the final answer.',
};

export class Agent implements ExecutableNode, VariableConsumer {
  readonly name: string;
  readonly role?: string;
  readonly inputFilter?: string[];
  readonly tools: Tool[];
  private readonly promptTemplate: string;
  private systemPrompt: string;
  private resolved = false;
  private readonly client: ModelClient;
  private readonly reasoning: ReasoningPattern;
  private readonly settings: Omit<GenerateOptions, 'tools'>;
  private readonly maxToolRounds: number;
  private readonly logger: winston.Logger;

  constructor(options: AgentOptions) {
    this.name = options.name;
    this.role = options.role;
    this.inputFilter = options.inputFilter;
    this.tools = options.tools ?? [];
    this.promptTemplate = options.systemPrompt;
    this.systemPrompt = options.systemPrompt;
    this.client = options.client;
    this.reasoning = options.reasoning ?? 'direct';
    this.settings = {
      temperature: getLLMConfig('reasoning').temperature,
      ...options.settings,
    };
    this.maxToolRounds = options.maxToolRounds ?? 5;
    this.logger = options.logger ?? defaultLogger;
  }

  get prompt(): string {
    return this.systemPrompt;
  }

  get isResolved(): boolean {
    return this.resolved;
  }

  requiredVariables(): Set<string> {
    return extractVariables(this.promptTemplate);
  }

  /**
   * Substitute the prompt template. The engine calls this before each run;
   * `run` resolves again whenever it is handed variables, so values never
   * carry over from an earlier run.
   */
  resolveVariables(variables: Variables): void {
    this.systemPrompt = resolveVariables(this.promptTemplate, variables, this.name);
    this.resolved = true;
  }

  async run(inputs: NodeInput[], variables: Variables = {}, context?: NodeRunContext): Promise<Message> {
    if (!this.resolved || Object.keys(variables).length > 0) {
      this.resolveVariables(variables);
    }

    const conversation: ChatMessage[] = [
      { role: 'system', content: this.buildSystemPrompt() },
      ...inputs.map((input) => this.toChatMessage(toMessage(input))),
    ];
    const options: GenerateOptions = {
      ...this.settings,
      ...(this.tools.length ? { tools: this.tools.map(toToolDefinition) } : {}),
    };

    let rounds = 0;
    for (;;) {
      const response = await this.client.generate(conversation, options);
      rounds += 1;

      if (response.toolCalls.length === 0 || rounds > this.maxToolRounds) {
        if (response.toolCalls.length) {
          this.logger.warn('Agent tool round limit reached', {
            agent: this.name,
            maxToolRounds: this.maxToolRounds,
          });
        }
        return createMessage('assistant', response.content, {
          source: this.name,
          metadata: { model: response.model ?? this.client.model, toolRounds: rounds - 1 },
        });
      }

      conversation.push({ role: 'assistant', content: response.content, toolCalls: response.toolCalls });
      for (const call of response.toolCalls) {
        conversation.push({
          role: 'tool',
          toolCallId: call.id,
          content: await this.executeTool(call, context),
        });
      }
    }
  }

  private buildSystemPrompt(): string {
    const parts = [this.role ? `You are ${this.role}.` : '', this.systemPrompt, REASONING_INSTRUCTIONS[this.reasoning]];
    return parts.filter(Boolean).join('\n\n');
  }

  private toChatMessage(message: Message): ChatMessage {
    const role = message.role === 'system' ? 'user' : message.role === 'tool' ? 'user' : message.role;
    if (message.content.type === 'text') {
      const label = message.source && role === 'assistant' && message.source !== this.name
        ? `[${message.source}] `
        : '';
      return { role, content: `${label}${message.content.text}` };
    }
    return { role: 'user', content: [message.content] };
  }

  private async executeTool(call: ToolCall, context?: NodeRunContext): Promise<string> {
    const tool = this.tools.find((candidate) => candidate.name === call.name);
    if (!tool) {
      return `Error: unknown tool "${call.name}"`;
    }

    let args: Record<string, unknown>;
    try {
      const parsed: unknown = call.arguments ? JSON.parse(call.arguments) : {};
      args = typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)
        ? Object.fromEntries(Object.entries(parsed))
        : {};
    } catch (error) {
      this.logger.warn('Tool arguments are not valid JSON', { agent: this.name, tool: call.name, error });
      return `Error: arguments for ${call.name} are not valid JSON`;
    }

    this.logger.debug('Agent calling tool', { agent: this.name, tool: call.name });
    return await tool.execute(args, context);
  }
}
