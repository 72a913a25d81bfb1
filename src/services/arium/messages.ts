import {
  INPUT_SOURCE,
  Message,
  MessageContent,
  MessageRole,
  NodeInput,
} from '../../types/messageTypes';

export function createMessage(
  role: MessageRole,
  content: MessageContent | string,
  extras: { source?: string; metadata?: Record<string, unknown> } = {},
): Message {
  const body: MessageContent =
    typeof content === 'string' ? { type: 'text', text: content } : { ...content };
  const message: Message = {
    role,
    content: Object.freeze(body),
    ...(extras.source !== undefined ? { source: extras.source } : {}),
    ...(extras.metadata ? { metadata: Object.freeze({ ...extras.metadata }) } : {}),
  };
  return Object.freeze(message);
}

export function userMessage(text: string, source: string = INPUT_SOURCE): Message {
  return createMessage('user', text, { source });
}

export function assistantMessage(text: string, source?: string): Message {
  return createMessage('assistant', text, { source });
}

export function isMessage(value: unknown): value is Message {
  if (typeof value !== 'object' || value === null) return false;
  if (!('role' in value) || !('content' in value)) return false;
  const { content } = value;
  return typeof content === 'object' && content !== null && 'type' in content;
}

/**
 * Coerce a node input into a message. Strings become messages of `role`.
 */
export function toMessage(input: NodeInput, role: MessageRole = 'user'): Message {
  return typeof input === 'string' ? createMessage(role, input) : input;
}

/**
 * Copy of `message` attributed to `source`, unless it already has one.
 */
export function withSource(message: Message, source: string): Message {
  if (message.source !== undefined) return message;
  return createMessage(message.role, message.content, {
    source,
    metadata: message.metadata ? { ...message.metadata } : undefined,
  });
}

/**
 * Copy of `message` recorded under `source`. A different earlier source is
 * kept as `metadata.origin`; the innermost origin wins across nesting levels.
 */
export function attributeTo(message: Message, source: string): Message {
  if (message.source === source) return message;
  const origin = message.metadata?.origin ?? message.source;
  return createMessage(message.role, message.content, {
    source,
    metadata: origin !== undefined ? { ...message.metadata, origin } : message.metadata,
  });
}

/**
 * Plain-text view of a message, used in prompts and router decisions.
 */
export function messageText(input: NodeInput): string {
  if (typeof input === 'string') return input;
  const { content } = input;
  switch (content.type) {
    case 'text':
      return content.text;
    case 'document':
      return content.title
        ? `[Document: ${content.title}]${content.text ? `\n${content.text}` : ''}`
        : content.text ?? '[Document]';
    case 'image':
      return `[Image${content.url ? `: ${content.url}` : ''}]`;
  }
}

export function describeMessage(message: Message): string {
  const who = message.source ? `${message.role} (${message.source})` : message.role;
  return `${who}: ${messageText(message)}`;
}
