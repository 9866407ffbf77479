import { describe, it, expect } from 'vitest';
import {
  cleanupText,
  convertToBullets,
  enhanceShortBullet,
  extractTitle,
  fitToLimit,
  formatDigest,
  truncateBullets
} from '../src/publisher/formatter.js';
import { COMPREHENSIVE_BULLETS, PLACEHOLDER_BULLET, buildPlaceholderText } from '../src/publisher/fallback.js';
import { HASHTAG_LINE, assembleDigest, buildHeader, charLength, formatDigestDate } from '../src/publisher/layout.js';

const DATE = 'October 19, 2026';

function bullet(label: string, length = 80): string {
  return `• ${label} `.padEnd(length, 'x');
}

describe('cleanupText', () => {
  it('strips emphasis, citations and heading marks and normalizes whitespace', () => {
    const raw = '**Bitcoin** rallied [1] after *strong* ETF flows.[2]\n\n\n## Outlook   ahead\t\tnow';
    expect(cleanupText(raw)).toBe('Bitcoin rallied after strong ETF flows.\n\nOutlook ahead now');
  });

  it('is idempotent and leaves no asterisks behind', () => {
    const inputs = [
      '  *a* **b** [3][4] c  \n  # d  ',
      '**Markets** *mixed*\r\n\r\n\r\n- item one [12]\n***bold italic*** end*',
      '[[1]2] nested citation and a stray * star'
    ];
    for (const input of inputs) {
      const once = cleanupText(input);
      expect(cleanupText(once)).toBe(once);
      expect(once).not.toContain('*');
    }
  });
});

describe('extractTitle', () => {
  it('takes a short first line as the title', () => {
    expect(extractTitle('Markets steady\nBody text here')).toEqual({
      title: 'Markets steady',
      body: 'Body text here'
    });
  });

  it('keeps the whole text as body when it is a single line', () => {
    expect(extractTitle('Only one line')).toEqual({ title: 'Only one line', body: 'Only one line' });
  });

  it('measures the title length in codepoints', () => {
    // 70 codepoints, 140 UTF-16 units
    const title = '🚀'.repeat(70);
    expect(extractTitle(`${title}\nmore`).title).toBe(title);
  });

  it('uses the default title for bulleted or long first lines', () => {
    expect(extractTitle('• item\nmore')).toEqual({ title: 'Crypto Market Update', body: '• item\nmore' });
    expect(extractTitle('- item\nmore').title).toBe('Crypto Market Update');

    const long = 'a'.repeat(120);
    expect(extractTitle(`${long}\nmore`).title).toBe('Crypto Market Update');
  });
});

describe('convertToBullets', () => {
  it('enhances short sentences by keyword and drops tiny fragments', () => {
    const body =
      'Bitcoin held steady over the weekend. Trading desks reported quiet sessions. ' +
      'Market makers widened spreads across most altcoin pairs. Gas was low. ' +
      'Ethereum fees dropped sharply! #crypto #eth';

    expect(convertToBullets(body)).toEqual([
      '• Bitcoin continues its market leadership with institutional interest',
      '• Trading volumes suggest increased market participation',
      '• Market makers widened spreads across most altcoin pairs',
      '• Ethereum shows network strength amid ongoing development'
    ]);
  });

  it('falls back to the comprehensive set below four bullets', () => {
    expect(convertToBullets('Only one sentence here that is long enough.')).toEqual([...COMPREHENSIVE_BULLETS]);
  });

  it('measures sentence and enhancement thresholds in codepoints', () => {
    // 12 codepoints, 20 UTF-16 units: too short to keep
    const tiny = `${'🚀'.repeat(8)} up.`;
    // 36 codepoints, 56 UTF-16 units once the period is gone: short enough to enhance
    const short = `Bitcoin rallied ${'📈'.repeat(20)}.`;
    const body = [
      tiny,
      short,
      'Exchanges listed several new perpetual contracts for mid-cap tokens this week.',
      'Stablecoin issuers reported steady redemptions across the major networks today.',
      'Regulators in Asia published draft guidance on custody for digital asset firms.'
    ].join(' ');

    expect(convertToBullets(body)).toEqual([
      '• Bitcoin continues its market leadership with institutional interest',
      '• Exchanges listed several new perpetual contracts for mid-cap tokens this week',
      '• Stablecoin issuers reported steady redemptions across the major networks today',
      '• Regulators in Asia published draft guidance on custody for digital asset firms'
    ]);
  });

  it('keeps only the first six bullets', () => {
    const body = Array.from({ length: 8 }, (_, i) => `Headline number ${i + 1} carries enough words to stay.`).join(' ');
    const bullets = convertToBullets(body);
    expect(bullets).toHaveLength(6);
    expect(bullets[0]).toBe('• Headline number 1 carries enough words to stay');
    expect(bullets[5]).toBe('• Headline number 6 carries enough words to stay');
  });
});

describe('enhanceShortBullet', () => {
  it('uses the first matching keyword in table order', () => {
    expect(enhanceShortBullet('Bitcoin price rose')).toBe(
      'Bitcoin continues its market leadership with institutional interest'
    );
    expect(enhanceShortBullet('Price swings widened')).toBe('Price action indicates key technical levels');
  });

  it('leaves sentences of 50 characters or more alone', () => {
    const sentence = 'Market makers widened spreads across most altcoin pairs';
    expect(enhanceShortBullet(sentence)).toBe(sentence);
  });

  it('leaves sentences without a keyword alone', () => {
    expect(enhanceShortBullet('Solana fees stayed low')).toBe('Solana fees stayed low');
  });
});

describe('length enforcement', () => {
  const header = buildHeader('Crypto Market Update', DATE);

  it('fits ten 80-character bullets into 800 characters', () => {
    const bullets = Array.from({ length: 10 }, (_, i) => bullet(`Item ${i + 1}`));
    expect(charLength(assembleDigest(header, bullets))).toBe(889);

    const text = fitToLimit(header, bullets);
    const lines = text.split('\n');
    const bulletLines = lines.filter(line => line.startsWith('• '));

    expect(charLength(text)).toBe(800);
    expect(bulletLines).toHaveLength(9);
    expect(bulletLines.slice(0, 8)).toEqual(bullets.slice(0, 8));
    expect(bulletLines[8]).toBe(`• Item 9 ${'x'.repeat(60)}...`);
    expect(text).not.toContain('Item 10');
    expect(lines[lines.length - 1]).toBe(HASHTAG_LINE);
  });

  it('leaves a digest under the limit untouched', () => {
    const bullets = [bullet('One'), bullet('Two'), bullet('Three'), bullet('Four')];
    expect(fitToLimit(header, bullets)).toBe(assembleDigest(header, bullets));
  });

  it('reverts to the first three bullets and clamps when even they overflow', () => {
    const bullets = Array.from({ length: 4 }, (_, i) => bullet(`Long ${i + 1}`, 400));
    const text = fitToLimit(header, bullets);

    expect(charLength(text)).toBe(800);
    expect(text.endsWith('…')).toBe(true);
    expect(text.startsWith(`${header[0]}\n${header[1]}\n\n${bullets[0]}\n`)).toBe(true);
  });
});

describe('truncateBullets', () => {
  it('shortens the first bullet that does not fit when more than 30 chars remain', () => {
    const bullets = [bullet('A', 50), bullet('B', 50), bullet('C', 50), bullet('D', 50)];
    // 51 + 51 + 51 = 153 used, 47 left for D
    expect(truncateBullets(bullets, 200)).toEqual([
      bullets[0],
      bullets[1],
      bullets[2],
      `${bullets[3].slice(0, 44)}...`
    ]);
  });

  it('drops the overflowing bullet when 30 chars or fewer remain', () => {
    const bullets = [bullet('A', 50), bullet('B', 50), bullet('C', 50), bullet('D', 50)];
    expect(truncateBullets(bullets, 170)).toEqual(bullets.slice(0, 3));
  });

  it('returns the first three originals when fewer than three survive', () => {
    const bullets = Array.from({ length: 4 }, (_, i) => bullet(`Long ${i + 1}`, 400));
    expect(truncateBullets(bullets, 500)).toEqual(bullets.slice(0, 3));
    expect(truncateBullets(bullets, 0)).toEqual(bullets.slice(0, 3));
  });
});

describe('formatDigest', () => {
  it('renders the title, date, bullets and hashtags', () => {
    const raw =
      '**Crypto markets rebound**\n' +
      'Bitcoin climbed back above $70,000 as spot ETF demand returned[1]. ' +
      'Ether gained alongside a broad altcoin recovery led by layer-2 tokens. ' +
      "Traders are watching Thursday's US inflation print for rate-cut signals[2]. " +
      'Stablecoin supply expanded for a third straight week, a sign of fresh liquidity.';

    const digest = formatDigest(raw, DATE);

    expect(digest.title).toBe('Crypto markets rebound');
    expect(digest.bullets).toHaveLength(4);
    expect(digest.text).toBe(
      [
        '📈 **Crypto markets rebound**',
        '📅 *October 19, 2026*',
        '',
        '• Bitcoin climbed back above $70,000 as spot ETF demand returned',
        '• Ether gained alongside a broad altcoin recovery led by layer-2 tokens',
        "• Traders are watching Thursday's US inflation print for rate-cut signals",
        '• Stablecoin supply expanded for a third straight week, a sign of fresh liquidity',
        '',
        '*#CryptoNews #MarketOverview*'
      ].join('\n')
    );
  });

  it('uses the comprehensive bullets when the model answer is too thin', () => {
    const digest = formatDigest('Quiet day.', DATE);
    expect(digest.title).toBe('Quiet day.');
    expect(digest.bullets).toEqual([...COMPREHENSIVE_BULLETS]);
    expect(charLength(digest.text)).toBeLessThanOrEqual(800);
  });

  it('returns the placeholder digest when formatting throws', () => {
    const digest = formatDigest(null as unknown as string, DATE);

    expect(digest.title).toBe('Crypto Market Update');
    expect(digest.bullets).toEqual([PLACEHOLDER_BULLET]);
    expect(digest.text).toBe(buildPlaceholderText(DATE));
  });
});

describe('formatDigestDate', () => {
  it('writes the long month with a two-digit day', () => {
    expect(formatDigestDate(new Date(2026, 9, 19, 9, 30))).toBe('October 19, 2026');
    expect(formatDigestDate(new Date(2026, 2, 5))).toBe('March 05, 2026');
  });
});
