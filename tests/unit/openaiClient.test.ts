import OpenAI from 'openai';
import {
  ChatCompletionsApi,
  CompletionResult,
  OpenAIModelClient,
  toOpenAIMessage,
} from '../../src/services/llm/openaiClient';

type CreateParams = OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming;

function fakeCompletions(result: CompletionResult): ChatCompletionsApi & { bodies: CreateParams[] } {
  const bodies: CreateParams[] = [];
  return {
    bodies,
    create: async (body) => {
      bodies.push(body);
      return result;
    },
  };
}

describe('toOpenAIMessage', () => {
  it('keeps user content parts and converts images to URLs', () => {
    expect(
      toOpenAIMessage({
        role: 'user',
        content: [
          { type: 'text', text: 'Look' },
          { type: 'image', base64: 'AAAA', mimeType: 'image/jpeg' },
        ],
      }),
    ).toEqual({
      role: 'user',
      content: [
        { type: 'text', text: 'Look' },
        { type: 'image_url', image_url: { url: 'data:image/jpeg;base64,AAAA' } },
      ],
    });
  });

  it('flattens system content to text', () => {
    expect(
      toOpenAIMessage({ role: 'system', content: [{ type: 'document', text: 'Rules', title: 'Policy' }] }),
    ).toEqual({ role: 'system', content: 'Rules' });
  });

  it('carries tool calls and tool call ids', () => {
    expect(
      toOpenAIMessage({
        role: 'assistant',
        content: '',
        toolCalls: [{ id: 'call-1', name: 'lookup', arguments: '{"q":"x"}' }],
      }),
    ).toEqual({
      role: 'assistant',
      content: '',
      tool_calls: [{ id: 'call-1', type: 'function', function: { name: 'lookup', arguments: '{"q":"x"}' } }],
    });
    expect(toOpenAIMessage({ role: 'tool', content: 'found', toolCallId: 'call-1' })).toEqual({
      role: 'tool',
      content: 'found',
      tool_call_id: 'call-1',
    });
  });
});

describe('OpenAIModelClient', () => {
  it('sends defaults and maps the completion', async () => {
    const completions = fakeCompletions({
      model: 'test-model-2024',
      choices: [
        {
          message: {
            content: null,
            tool_calls: [{ id: 'call-9', function: { name: 'lookup', arguments: '{}' } }],
          },
        },
      ],
      usage: { prompt_tokens: 12, completion_tokens: 3 },
    });
    const client = new OpenAIModelClient({ model: 'test-model', temperature: 0.4, completions });

    const response = await client.generate([{ role: 'user', content: 'Hi' }], {
      maxTokens: 20,
      tools: [{ name: 'lookup', description: 'Look things up', parameters: { type: 'object' } }],
    });

    expect(completions.bodies).toEqual([
      {
        model: 'test-model',
        messages: [{ role: 'user', content: 'Hi' }],
        temperature: 0.4,
        max_tokens: 20,
        tools: [
          {
            type: 'function',
            function: { name: 'lookup', description: 'Look things up', parameters: { type: 'object' } },
          },
        ],
      },
    ]);
    expect(response).toEqual({
      content: '',
      toolCalls: [{ id: 'call-9', name: 'lookup', arguments: '{}' }],
      model: 'test-model-2024',
      usage: { promptTokens: 12, completionTokens: 3 },
    });
  });

  it('requests JSON output when asked', async () => {
    const completions = fakeCompletions({ model: 'm', choices: [{ message: { content: '{}' } }] });
    const client = new OpenAIModelClient({ model: 'm', completions });

    const response = await client.generate([{ role: 'user', content: 'Hi' }], { responseFormat: 'json' });

    expect(completions.bodies[0].response_format).toEqual({ type: 'json_object' });
    expect(completions.bodies[0].temperature).toBeUndefined();
    expect(response.content).toBe('{}');
  });

  it('fails on first use when no API key is configured', async () => {
    const saved = process.env.OPENAI_API_KEY;
    delete process.env.OPENAI_API_KEY;
    try {
      const client = new OpenAIModelClient({ model: 'm' });
      await expect(client.generate([{ role: 'user', content: 'Hi' }])).rejects.toThrow(
        'OPENAI_API_KEY is required for LLM calls',
      );
    } finally {
      if (saved !== undefined) process.env.OPENAI_API_KEY = saved;
    }
  });
});
