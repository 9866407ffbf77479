import { logger } from '../shared/logger.js';
import { BULLET_PREFIX, HASHTAG_LINE, MAX_DIGEST_CHARS, charLength } from './layout.js';

export interface DigestValidation {
  isValid: boolean;
  charCount: number;
  bulletCount: number;
  issues: string[];
}

export function validateDigest(text: string): DigestValidation {
  const issues: string[] = [];
  const lines = text.split('\n');
  const charCount = charLength(text);

  // 1. Hard ceiling
  if (charCount > MAX_DIGEST_CHARS) {
    issues.push(`Digest is ${charCount} chars (limit ${MAX_DIGEST_CHARS})`);
  }

  // 2. Header
  const [titleLine = '', dateLine = ''] = lines;
  if (!titleLine.startsWith('📈 **') || !titleLine.endsWith('**')) {
    issues.push('Missing title line');
  }
  if (!dateLine.startsWith('📅 *') || !dateLine.endsWith('*')) {
    issues.push('Missing date line');
  }

  // 3. Bullets
  const bulletCount = lines.filter(line => line.startsWith(BULLET_PREFIX)).length;
  if (bulletCount < 3 || bulletCount > 6) {
    issues.push(`Expected 3-6 bullets, found ${bulletCount}`);
  }

  // 4. Hashtags close the digest
  if (lines[lines.length - 1] !== HASHTAG_LINE) {
    issues.push('Missing hashtag line');
  }

  const isValid = issues.length === 0;

  if (!isValid) {
    logger.warn('Digest failed validation', { charCount, bulletCount, issues });
  }

  return { isValid, charCount, bulletCount, issues };
}
