/**
 * Market question heuristics shared by the crypto strategies.
 */

// Symbol -> words that name it in a market question
const ASSET_KEYWORDS: ReadonlyArray<[string, string[]]> = [
  ['BTC', ['btc', 'bitcoin']],
  ['ETH', ['eth', 'ethereum']],
  ['SOL', ['sol', 'solana']],
  ['XRP', ['xrp', 'ripple']],
  ['DOGE', ['doge', 'dogecoin']],
  ['AVAX', ['avax', 'avalanche']],
  ['LINK', ['chainlink']],
  ['UNI', ['uniswap']],
  ['MATIC', ['matic', 'polygon']],
  ['ADA', ['ada', 'cardano']],
];

/**
 * Crypto asset named in the question, or null for non-crypto markets
 */
export function detectAsset(question: string): string | null {
  const words = new Set(question.toLowerCase().split(/[^a-z0-9]+/).filter(Boolean));
  for (const [symbol, keywords] of ASSET_KEYWORDS) {
    if (keywords.some(keyword => words.has(keyword))) return symbol;
  }
  return null;
}

/**
 * 15-minute contracts carry the taker fee
 */
export function isFifteenMinuteMarket(question: string): boolean {
  return /\b15\s*(m|min|mins|minute|minutes)\b/i.test(question) || /\b15\b/.test(question);
}

export function isUpDownMarket(question: string): boolean {
  return /\b(up|down)\b/i.test(question);
}
