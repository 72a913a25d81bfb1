/**
 * Type definitions for messages flowing through a graph run
 */

export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

export interface TextContent {
  type: 'text';
  text: string;
}

export interface ImageContent {
  type: 'image';
  url?: string;
  base64?: string;
  mimeType?: string;
}

export interface DocumentContent {
  type: 'document';
  title?: string;
  text?: string;
  mimeType?: string;
}

export type MessageContent = TextContent | ImageContent | DocumentContent;

export interface Message {
  readonly role: MessageRole;
  readonly content: MessageContent;
  /** Node that produced the message; `input` for the run's initial inputs */
  readonly source?: string;
  readonly metadata?: Readonly<Record<string, unknown>>;
}

export type NodeInput = Message | string;

export type Variables = Readonly<Record<string, string>>;

export const INPUT_SOURCE = 'input';
