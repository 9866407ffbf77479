import axios, { type AxiosInstance } from 'axios';
import type { ComposedContent } from '../shared/types.js';
import type { DigestConfig } from '../shared/config.js';
import { logger } from '../shared/logger.js';
import { monitor as defaultMonitor, type DigestSource, type Monitor } from '../shared/monitor.js';
import { validateDigest } from './validator.js';
import { pingCompletionApi, requestNewsCompletion } from '../collectors/perplexity.js';
import { extractContent } from '../analyzers/extractor.js';
import { buildFallbackText } from './fallback.js';
import { formatDigest } from './formatter.js';
import { charLength, formatDigestDate } from './layout.js';
import { selectImage } from './images.js';

export interface ComposerDependencies {
  http?: AxiosInstance;
  monitor?: Monitor;
  now?: () => Date;
}

/**
 * Builds the daily crypto news digest: one completion request, extraction,
 * formatting into the fixed template and an illustrative image.
 *
 * `getContent()` never rejects. Every failure along the way is logged and
 * answered with the canned fallback digest for today's date.
 */
export class ContentComposer {
  private readonly http: AxiosInstance;
  private readonly monitor: Monitor;
  private readonly now: () => Date;

  constructor(
    private readonly settings: DigestConfig,
    deps: ComposerDependencies = {}
  ) {
    this.http = deps.http ?? axios.create();
    this.monitor = deps.monitor ?? defaultMonitor;
    this.now = deps.now ?? (() => new Date());
  }

  async getContent(): Promise<ComposedContent> {
    const date = formatDigestDate(this.now());

    try {
      const started = Date.now();
      const result = await requestNewsCompletion(this.http, this.settings, date);
      this.monitor.recordCompletion(result.ok, Date.now() - started);

      if (!result.ok) {
        this.monitor.recordError(new Error(result.reason));
        return await this.composeFallback(date);
      }

      const content = extractContent(result.body);
      if (!content) {
        logger.warn('No content extracted, using fallback');
        return await this.composeFallback(date);
      }

      const { text } = formatDigest(content, date);
      const composed = await this.finish(text, 'live');
      logger.info(`Digest ready: ${composed.charCount} chars`);
      return composed;
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.monitor.recordError(err);
      return this.composeFallback(date);
    }
  }

  // Kept for callers that still pass a topic; the digest is always the market news one
  async getDailyContent(_topic?: string): Promise<ComposedContent> {
    return this.getContent();
  }

  async testConnection(): Promise<boolean> {
    return pingCompletionApi(this.http, this.settings);
  }

  private async composeFallback(date: string): Promise<ComposedContent> {
    logger.warn(`Serving fallback digest for ${date}`);
    return this.finish(buildFallbackText(date), 'fallback');
  }

  private async finish(text: string, source: DigestSource): Promise<ComposedContent> {
    if (this.settings.enableValidation) {
      validateDigest(text);
    }

    const imageUrl = await selectImage(text, {
      http: this.http,
      timeoutMs: this.settings.imageProbeTimeoutMs,
      monitor: this.monitor
    });

    this.monitor.recordDigest(source);
    return { text, imageUrl, charCount: charLength(text) };
  }
}
