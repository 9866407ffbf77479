import { logger } from '../shared/logger.js';
import { COMPREHENSIVE_BULLETS, PLACEHOLDER_BULLET, buildPlaceholderText } from './fallback.js';
import {
  BULLET_PREFIX,
  DEFAULT_TITLE,
  HASHTAG_LINE,
  MAX_DIGEST_CHARS,
  assembleDigest,
  buildHeader,
  charLength,
  clampToLimit,
  sliceChars
} from './layout.js';

export interface FormattedDigest {
  title: string;
  bullets: string[]; // before length enforcement
  text: string;
}

const MAX_TITLE_CHARS = 120;
const MIN_SENTENCE_CHARS = 15;
const ENHANCE_BELOW_CHARS = 60;
const ENHANCEMENT_MAX_CHARS = 50;
const MIN_BULLETS = 4;
const MAX_BULLETS = 6;
const KEEP_AT_LEAST = 3;
const MIN_SHORTENED_CHARS = 30;

// Checked in order, first keyword found wins
const ENHANCEMENTS: ReadonlyArray<readonly [keyword: string, replacement: string]> = [
  ['bitcoin', 'Bitcoin continues its market leadership with institutional interest'],
  ['ethereum', 'Ethereum shows network strength amid ongoing development'],
  ['market', 'Market dynamics reflect broader economic sentiment'],
  ['price', 'Price action indicates key technical levels'],
  ['trading', 'Trading volumes suggest increased market participation']
];

export function cleanupText(raw: string): string {
  let text = raw.replace(/\r\n?/g, '\n');

  // Markdown emphasis, then any stray asterisks left behind
  text = text
    .replace(/\*\*(.+?)\*\*/g, '$1')
    .replace(/\*(.+?)\*/g, '$1')
    .replace(/\*/g, '');

  // Citation markers like [1]; repeat until none are left
  let previous: string;
  do {
    previous = text;
    text = text.replace(/\[\d+\]/g, '');
  } while (text !== previous);

  text = text
    .replace(/[ \t]+/g, ' ')
    .replace(/ ?\n ?/g, '\n')
    .trim();

  return text
    .replace(/^(?:#{1,6} )+/gm, '')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

export function extractTitle(cleaned: string): { title: string; body: string } {
  const lines = cleaned.split('\n');
  const firstLine = (lines[0] ?? '').trim();

  if (
    firstLine &&
    charLength(firstLine) < MAX_TITLE_CHARS &&
    !firstLine.startsWith('•') &&
    !firstLine.startsWith('-')
  ) {
    const body = lines.slice(1).join('\n').trim();
    return { title: firstLine, body: body || cleaned };
  }

  return { title: DEFAULT_TITLE, body: cleaned };
}

export function enhanceShortBullet(sentence: string): string {
  if (charLength(sentence) >= ENHANCEMENT_MAX_CHARS) return sentence;

  const lower = sentence.toLowerCase();
  for (const [keyword, replacement] of ENHANCEMENTS) {
    if (lower.includes(keyword)) {
      return replacement;
    }
  }
  return sentence;
}

export function convertToBullets(body: string): string[] {
  const withoutTags = body.replace(/(?:#\w+\s*)+$/, '').trim();

  const sentences = withoutTags
    .replace(/([.!?])/g, '$1|')
    .split('|')
    .map(s => s.trim())
    .filter(s => charLength(s) > MIN_SENTENCE_CHARS);

  const bullets: string[] = [];
  for (const raw of sentences) {
    let sentence = raw.replace(/[.!?]+$/, '').trim();
    if (!sentence) continue;
    if (charLength(sentence) < ENHANCE_BELOW_CHARS) {
      sentence = enhanceShortBullet(sentence);
    }
    bullets.push(`${BULLET_PREFIX}${sentence}`);
  }

  if (bullets.length < MIN_BULLETS) {
    return [...COMPREHENSIVE_BULLETS];
  }
  return bullets.slice(0, MAX_BULLETS);
}

/**
 * Keeps as many whole bullets as fit in `maxChars` (each costs one extra
 * character for its line break). The first bullet that does not fit is cut
 * with "..." when more than 30 characters remain. If that leaves fewer than
 * three bullets the first three originals are returned instead and the caller
 * clamps whatever still overflows.
 */
export function truncateBullets(bullets: string[], maxChars: number): string[] {
  const result: string[] = [];
  let used = 0;

  for (const bullet of bullets) {
    const cost = charLength(bullet) + 1;
    if (used + cost <= maxChars) {
      result.push(bullet);
      used += cost;
      continue;
    }

    const remaining = maxChars - used;
    if (remaining > MIN_SHORTENED_CHARS) {
      result.push(sliceChars(bullet, remaining - 3).trimEnd() + '...');
    }
    break;
  }

  if (result.length < KEEP_AT_LEAST && bullets.length > 0) {
    return bullets.slice(0, KEEP_AT_LEAST);
  }
  return result;
}

export function bulletBudget(header: string[]): number {
  const fixed = charLength(header.join('\n')) + 1 + charLength(HASHTAG_LINE) + 2;
  return Math.max(0, MAX_DIGEST_CHARS - fixed);
}

export function fitToLimit(header: string[], bullets: string[]): string {
  let text = assembleDigest(header, bullets);

  if (charLength(text) > MAX_DIGEST_CHARS) {
    const truncated = truncateBullets(bullets, bulletBudget(header));
    logger.debug(`Digest over ${MAX_DIGEST_CHARS} chars, kept ${truncated.length}/${bullets.length} bullets`);
    text = assembleDigest(header, truncated);
  }

  return clampToLimit(text);
}

export function formatDigest(raw: string, date: string): FormattedDigest {
  try {
    const cleaned = cleanupText(raw);
    const { title, body } = extractTitle(cleaned);
    const header = buildHeader(title, date);
    const bullets = convertToBullets(body);

    return { title, bullets, text: fitToLimit(header, bullets) };
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.error('Digest formatting failed', err.message);
    return {
      title: DEFAULT_TITLE,
      bullets: [PLACEHOLDER_BULLET],
      text: buildPlaceholderText(date)
    };
  }
}
