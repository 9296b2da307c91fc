const QUOTE_ASSETS = ['USDT', 'USDC', 'USD', 'EUR', 'BTC', 'ETH'];
const BASE_ALIASES: Record<string, string> = {
  XBT: 'BTC',
};

const SWAP_SUFFIX = 'SWAP';

export interface PairParts {
  base: string;
  quote: string;
}

const splitCompact = (symbol: string): PairParts | null => {
  for (const q of QUOTE_ASSETS) {
    if (symbol.endsWith(q)) {
      const base = symbol.slice(0, symbol.length - q.length);
      if (!base) return null;
      return { base, quote: q };
    }
  }
  return null;
};

/**
 * Accepts `BTC-USDT`, `btc/usdt`, `BTC_USDT` or `BTCUSDT`.
 */
export const splitTradingPair = (tradingPair: string): PairParts | null => {
  const upper = tradingPair.trim().toUpperCase();
  if (!upper) return null;

  const delimited = upper.split(/[-/_]/).filter(Boolean);
  let parts: PairParts | null;
  if (delimited.length === 2) {
    parts = { base: delimited[0], quote: delimited[1] };
  } else if (delimited.length === 1) {
    parts = splitCompact(delimited[0]);
  } else {
    parts = null;
  }
  if (!parts || !/^[A-Z0-9]+$/.test(parts.base) || !/^[A-Z0-9]+$/.test(parts.quote)) {
    return null;
  }
  return { base: BASE_ALIASES[parts.base] ?? parts.base, quote: parts.quote };
};

export const normalizeTradingPair = (tradingPair: string): string | null => {
  const parts = splitTradingPair(tradingPair);
  return parts ? `${parts.base}-${parts.quote}` : null;
};

export const swapInstIdFromTradingPair = (tradingPair: string): string | null => {
  const parts = splitTradingPair(tradingPair);
  return parts ? `${parts.base}-${parts.quote}-${SWAP_SUFFIX}` : null;
};

export const tradingPairFromSwapInstId = (instId: string): string | null => {
  const segments = instId.trim().toUpperCase().split('-');
  if (segments.length !== 3 || segments[2] !== SWAP_SUFFIX) {
    return null;
  }
  const [base, quote] = segments;
  if (!base || !quote) return null;
  return `${base}-${quote}`;
};
