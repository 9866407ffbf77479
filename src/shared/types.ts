export interface ComposedContent {
  text: string;
  imageUrl: string;
  charCount: number; // codepoints, not UTF-16 units
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionPayload {
  model: string;
  messages: ChatMessage[];
  max_tokens: number;
  temperature?: number;
  stream?: boolean;
}

// Parsed response body, whatever shape the provider sent back
export type ResponseNode =
  | { kind: 'object'; entries: Array<[string, ResponseNode]> }
  | { kind: 'array'; items: ResponseNode[] }
  | { kind: 'string'; value: string }
  | { kind: 'scalar' };
