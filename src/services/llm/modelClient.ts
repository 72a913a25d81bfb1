/**
 * Contract between graph nodes/routers and a language-model provider.
 * Concrete providers live behind this interface; the engine never talks
 * to a vendor SDK directly.
 */

import { MessageContent } from '../../types/messageTypes';
import type { NodeRunContext } from '../arium/types';

export type ChatRole = 'system' | 'user' | 'assistant' | 'tool';

export interface ChatMessage {
  role: ChatRole;
  content: string | MessageContent[];
  /** Set on assistant turns that requested tools */
  toolCalls?: ToolCall[];
  /** Set on tool turns: the call being answered */
  toolCallId?: string;
}

export interface ToolCall {
  id: string;
  name: string;
  /** Raw JSON arguments as produced by the model */
  arguments: string;
}

export interface ToolDefinition {
  name: string;
  description: string;
  /** JSON Schema object describing the arguments */
  parameters: Record<string, unknown>;
}

export interface Tool extends ToolDefinition {
  /** `context` is the run of the agent calling the tool, when there is one */
  execute(args: Record<string, unknown>, context?: NodeRunContext): Promise<string> | string;
}

export interface GenerateOptions {
  temperature?: number;
  maxTokens?: number;
  tools?: ToolDefinition[];
  responseFormat?: 'text' | 'json';
}

export interface ModelUsage {
  promptTokens?: number;
  completionTokens?: number;
}

export interface ModelResponse {
  content: string;
  toolCalls: ToolCall[];
  usage?: ModelUsage;
  model?: string;
}

export interface ModelClient {
  readonly model: string;
  generate(messages: ChatMessage[], options?: GenerateOptions): Promise<ModelResponse>;
}

export interface ModelConfig {
  provider?: string;
  name?: string;
  baseUrl?: string;
}

export type ModelSettings = Record<string, unknown>;

export function toToolDefinition(tool: ToolDefinition): ToolDefinition {
  return { name: tool.name, description: tool.description, parameters: tool.parameters };
}
