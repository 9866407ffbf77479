import { createHash } from 'node:crypto';
import type { AxiosInstance } from 'axios';
import { logger } from '../shared/logger.js';
import type { Monitor } from '../shared/monitor.js';

export const FALLBACK_IMAGE_URL =
  'https://images.unsplash.com/photo-1640340434855-6084b1f4901c?w=1200&h=800&fit=crop';

export interface ImageOptions {
  http: AxiosInstance;
  timeoutMs: number;
  monitor?: Monitor;
}

export function contentKey(text: string): string {
  return createHash('md5').update(text, 'utf8').digest('hex').slice(0, 8);
}

export function imagePool(key: string): string[] {
  return [
    `https://source.unsplash.com/1200x800/?cryptocurrency,trading,${key}`,
    'https://source.unsplash.com/1200x800/?bitcoin,market,analysis',
    'https://source.unsplash.com/1200x800/?blockchain,finance,charts',
    `https://picsum.photos/1200/800?random=${key}`,
    FALLBACK_IMAGE_URL,
    'https://images.unsplash.com/photo-1559757175-0eb30cd8c063?w=1200&h=800&fit=crop',
    'https://images.unsplash.com/photo-1616499370260-485b3e5ed653?w=1200&h=800&fit=crop'
  ];
}

export function pickImage(text: string): { index: number; url: string } {
  const key = contentKey(text);
  const pool = imagePool(key);
  const index = parseInt(key, 16) % pool.length;
  return { index, url: pool[index] };
}

async function probe(url: string, options: ImageOptions): Promise<boolean> {
  const started = Date.now();
  try {
    const response = await options.http.head(url, {
      timeout: options.timeoutMs,
      maxRedirects: 5,
      validateStatus: () => true
    });
    const reachable = response.status === 200;
    options.monitor?.recordImageProbe(reachable, Date.now() - started);
    return reachable;
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.warn(`Image probe failed for ${url}`, err.message);
    options.monitor?.recordImageProbe(false, Date.now() - started);
    return false;
  }
}

export async function selectImage(text: string, options: ImageOptions): Promise<string> {
  let url: string;
  try {
    url = pickImage(text).url;
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.error('Image selection failed', err.message);
    return FALLBACK_IMAGE_URL;
  }

  if (await probe(url, options)) {
    logger.info(`Selected image: ${url}`);
    return url;
  }
  return FALLBACK_IMAGE_URL;
}
