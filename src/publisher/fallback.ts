import { assembleDigest, buildHeader, clampToLimit, DEFAULT_TITLE } from './layout.js';

// Replaces the parsed bullets when the model returned too little to work with
export const COMPREHENSIVE_BULLETS: readonly string[] = [
  '• Bitcoin maintains consolidation above key support levels with institutional accumulation patterns emerging',
  '• Ethereum demonstrates network resilience with increasing validator participation and Layer 2 adoption growth',
  '• Top altcoins including BNB, XRP, and SOL show divergent performance reflecting sector-specific developments',
  '• Market sentiment indicators suggest cautious optimism amid ongoing regulatory clarity initiatives',
  '• DeFi and AI token sectors attract renewed interest following recent technological breakthroughs',
  '• Technical analysis reveals critical support and resistance zones shaping near-term price trajectories'
];

// Served when the request or extraction produced nothing
export const FALLBACK_BULLETS: readonly string[] = [
  '• Bitcoin trading activity continues with notable institutional transactions reported',
  '• Ethereum network updates and Layer 2 scaling solutions see increased adoption',
  '• Major altcoins display varied performance across different market segments',
  '• Global economic indicators and central bank policies influence crypto market sentiment',
  '• Regulatory developments in key jurisdictions impact trading volumes and market access',
  '• Upcoming industry events and protocol upgrades scheduled for near-term implementation'
];

export const PLACEHOLDER_BULLET = '• Comprehensive market analysis in progress';

export function buildFallbackText(date: string): string {
  return clampToLimit(assembleDigest(buildHeader(DEFAULT_TITLE, date), [...FALLBACK_BULLETS]));
}

export function buildPlaceholderText(date: string): string {
  return clampToLimit(assembleDigest(buildHeader(DEFAULT_TITLE, date), [PLACEHOLDER_BULLET]));
}
