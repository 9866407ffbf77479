import type { AxiosInstance } from 'axios';
import type { ChatMessage, CompletionPayload } from '../shared/types.js';
import type { DigestConfig } from '../shared/config.js';
import { logger } from '../shared/logger.js';

export type CompletionSettings = Pick<
  DigestConfig,
  'apiKey' | 'baseUrl' | 'model' | 'maxTokens' | 'temperature' | 'requestTimeoutMs' | 'connectionTimeoutMs'
>;

export type CompletionResult =
  | { ok: true; body: unknown }
  | { ok: false; reason: string };

export const SYSTEM_PROMPT =
  'You are a professional crypto news reporter. Provide factual market summaries ' +
  'focused on news and events. Report what happened and what\'s upcoming without offering ' +
  'market predictions or investment guidance.';

export function buildNewsPrompt(date: string): string {
  return `Summarize today's top global news about crypto market. Include major global economic events, and highlight any breaking news about near future events. Make an article no more than 800 characters (with spaces). Don't provide any guidance for the market trend.

Today's date: ${date}`;
}

export function buildNewsPayload(settings: CompletionSettings, date: string): CompletionPayload {
  const messages: ChatMessage[] = [
    { role: 'system', content: SYSTEM_PROMPT },
    { role: 'user', content: buildNewsPrompt(date) }
  ];

  return {
    model: settings.model,
    messages,
    max_tokens: settings.maxTokens,
    temperature: settings.temperature,
    stream: false
  };
}

function headers(apiKey: string | undefined) {
  return {
    Authorization: `Bearer ${apiKey ?? ''}`,
    'Content-Type': 'application/json',
    Accept: 'application/json'
  };
}

function parseBody(data: unknown): unknown {
  return typeof data === 'string' ? JSON.parse(data) : data;
}

export async function requestNewsCompletion(
  http: AxiosInstance,
  settings: CompletionSettings,
  date: string
): Promise<CompletionResult> {
  try {
    logger.info('Requesting crypto news digest', { model: settings.model, date });

    const response = await http.post<unknown>(settings.baseUrl, buildNewsPayload(settings, date), {
      headers: headers(settings.apiKey),
      timeout: settings.requestTimeoutMs,
      // Status and JSON are checked here, not by axios
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true
    });

    if (response.status !== 200) {
      logger.error(`Completion API failed: ${response.status}`);
      return { ok: false, reason: `HTTP ${response.status}` };
    }

    try {
      return { ok: true, body: parseBody(response.data) };
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error('Completion response is not valid JSON', err.message);
      return { ok: false, reason: `Invalid JSON: ${err.message}` };
    }
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.error('Completion request failed', err.message);
    return { ok: false, reason: err.message };
  }
}

export async function pingCompletionApi(http: AxiosInstance, settings: CompletionSettings): Promise<boolean> {
  try {
    const payload: CompletionPayload = {
      model: settings.model,
      messages: [{ role: 'user', content: 'Test' }],
      max_tokens: 10
    };

    const response = await http.post<unknown>(settings.baseUrl, payload, {
      headers: headers(settings.apiKey),
      timeout: settings.connectionTimeoutMs,
      validateStatus: () => true
    });

    if (response.status === 200) {
      logger.info('Completion API connection successful');
      return true;
    }

    logger.warn(`Completion API connection check returned ${response.status}`);
    return false;
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.error('Completion API connection check failed', err.message);
    return false;
  }
}
