import OpenAI from 'openai';
import type winston from 'winston';
import defaultLogger from '../../utils/logger';
import { getSettings } from '../../config/settings';
import { MessageContent } from '../../types/messageTypes';
import {
  ChatMessage,
  GenerateOptions,
  ModelClient,
  ModelResponse,
  ToolCall,
} from './modelClient';

type CompletionMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;
type ContentPart = OpenAI.Chat.Completions.ChatCompletionContentPart;

/** The slice of a chat completion this client reads */
export interface CompletionResult {
  model: string;
  choices: Array<{
    message: {
      content: string | null;
      tool_calls?: Array<{ id: string; function: { name: string; arguments: string } }>;
    };
  }>;
  usage?: { prompt_tokens: number; completion_tokens: number };
}

/** Satisfied by `new OpenAI().chat.completions` */
export interface ChatCompletionsApi {
  create(body: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming): Promise<CompletionResult>;
}

export interface OpenAIModelClientOptions {
  model?: string;
  apiKey?: string;
  baseUrl?: string;
  temperature?: number;
  maxTokens?: number;
  /** Pre-built completions endpoint; skips lazy SDK construction */
  completions?: ChatCompletionsApi;
  logger?: winston.Logger;
}

function toContentPart(content: MessageContent): ContentPart {
  switch (content.type) {
    case 'text':
      return { type: 'text', text: content.text };
    case 'image': {
      const url =
        content.url ??
        `data:${content.mimeType ?? 'image/png'};base64,${content.base64 ?? ''}`;
      return { type: 'image_url', image_url: { url } };
    }
    case 'document':
      return {
        type: 'text',
        text: `${content.title ? `[Document: ${content.title}]\n` : ''}${content.text ?? ''}`,
      };
  }
}

function flattenText(content: ChatMessage['content']): string {
  if (typeof content === 'string') return content;
  return content
    .map((part) => (part.type === 'text' ? part.text : part.type === 'document' ? part.text ?? '' : ''))
    .join('\n');
}

export function toOpenAIMessage(message: ChatMessage): CompletionMessage {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: flattenText(message.content) };
    case 'user':
      return {
        role: 'user',
        content:
          typeof message.content === 'string'
            ? message.content
            : message.content.map(toContentPart),
      };
    case 'assistant':
      return {
        role: 'assistant',
        content: flattenText(message.content),
        ...(message.toolCalls?.length
          ? {
              tool_calls: message.toolCalls.map((call) => ({
                id: call.id,
                type: 'function' as const,
                function: { name: call.name, arguments: call.arguments },
              })),
            }
          : {}),
      };
    case 'tool':
      return {
        role: 'tool',
        content: flattenText(message.content),
        tool_call_id: message.toolCallId ?? '',
      };
  }
}

/**
 * ModelClient backed by the OpenAI chat completions API.
 */
export class OpenAIModelClient implements ModelClient {
  readonly model: string;
  private completions: ChatCompletionsApi | null;
  private readonly apiKey?: string;
  private readonly baseUrl?: string;
  private readonly temperature?: number;
  private readonly maxTokens?: number;
  private readonly logger: winston.Logger;

  constructor(options: OpenAIModelClientOptions = {}) {
    const settings = getSettings();
    this.model = options.model || settings.defaultModel;
    this.apiKey = options.apiKey ?? settings.openaiApiKey;
    this.baseUrl = options.baseUrl ?? settings.openaiBaseUrl;
    this.temperature = options.temperature;
    this.maxTokens = options.maxTokens;
    this.completions = options.completions ?? null;
    this.logger = options.logger ?? defaultLogger;
  }

  private getCompletions(): ChatCompletionsApi {
    if (!this.completions) {
      if (!this.apiKey) {
        throw new Error('OPENAI_API_KEY is required for LLM calls');
      }
      this.completions = new OpenAI({ apiKey: this.apiKey, baseURL: this.baseUrl }).chat.completions;
    }
    return this.completions;
  }

  async generate(messages: ChatMessage[], options: GenerateOptions = {}): Promise<ModelResponse> {
    const temperature = options.temperature ?? this.temperature;
    const maxTokens = options.maxTokens ?? this.maxTokens;

    const completion = await this.getCompletions().create({
      model: this.model,
      messages: messages.map(toOpenAIMessage),
      ...(temperature !== undefined ? { temperature } : {}),
      ...(maxTokens !== undefined ? { max_tokens: maxTokens } : {}),
      ...(options.responseFormat === 'json'
        ? { response_format: { type: 'json_object' as const } }
        : {}),
      ...(options.tools?.length
        ? {
            tools: options.tools.map((tool) => ({
              type: 'function' as const,
              function: {
                name: tool.name,
                description: tool.description,
                parameters: tool.parameters,
              },
            })),
          }
        : {}),
    });

    const choice = completion.choices[0];
    const toolCalls: ToolCall[] = (choice?.message.tool_calls ?? []).map((call) => ({
      id: call.id,
      name: call.function.name,
      arguments: call.function.arguments,
    }));

    this.logger.debug('OpenAI completion received', {
      model: this.model,
      toolCalls: toolCalls.length,
      promptTokens: completion.usage?.prompt_tokens,
      completionTokens: completion.usage?.completion_tokens,
    });

    return {
      content: choice?.message.content ?? '',
      toolCalls,
      model: completion.model,
      usage: {
        promptTokens: completion.usage?.prompt_tokens,
        completionTokens: completion.usage?.completion_tokens,
      },
    };
  }
}
