export const MAX_DIGEST_CHARS = 800;
export const DEFAULT_TITLE = 'Crypto Market Update';
export const HASHTAG_LINE = '*#CryptoNews #MarketOverview*';
export const BULLET_PREFIX = '• ';

const dateFormat = new Intl.DateTimeFormat('en-US', {
  month: 'long',
  day: '2-digit',
  year: 'numeric'
});

// "October 05, 2026"
export function formatDigestDate(date: Date): string {
  return dateFormat.format(date);
}

// Lengths are counted in codepoints so the emoji in the header count once
export function charLength(text: string): number {
  return Array.from(text).length;
}

export function sliceChars(text: string, end: number): string {
  return Array.from(text).slice(0, Math.max(0, end)).join('');
}

export function buildHeader(title: string, date: string): string[] {
  return [`📈 **${title}**`, `📅 *${date}*`, ''];
}

export function assembleDigest(header: string[], bullets: string[]): string {
  return [...header, ...bullets, '', HASHTAG_LINE].join('\n');
}

export function clampToLimit(text: string, limit: number = MAX_DIGEST_CHARS): string {
  if (charLength(text) <= limit) return text;
  return sliceChars(text, limit - 1) + '…';
}
