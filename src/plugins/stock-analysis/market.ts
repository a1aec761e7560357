import type { MarketType } from '../../services/providers/stock-data.js';

/** Codes the analyze command accepts */
export const STOCK_CODE_PATTERN = /^[0-9A-Za-z]{4,8}$/;

const A_SHARE_PREFIXES = ['60', '00', '30', '68', '001', '002', '003', '004', '005'];
const ETF_PREFIXES = ['51', '56', '58', '15'];
const LOF_PREFIXES = ['16', '50'];

const MARKET_LABELS: Record<MarketType, string> = {
  A: 'A股',
  ETF: 'ETF基金',
  LOF: 'LOF基金',
  HK: '港股',
  US: '美股',
};

const CURRENCIES: Record<MarketType, { code: string; symbol: string }> = {
  A: { code: 'CNY', symbol: '¥' },
  ETF: { code: 'CNY', symbol: '¥' },
  LOF: { code: 'CNY', symbol: '¥' },
  HK: { code: 'HKD', symbol: 'HK$' },
  US: { code: 'USD', symbol: '$' },
};

function startsWithAny(code: string, prefixes: readonly string[]): boolean {
  return prefixes.some((prefix) => code.startsWith(prefix));
}

/**
 * Market of a code, by its shape alone
 *
 * Six digits are mainland listings, classified by prefix. Five digits are Hong
 * Kong. Anything else is read as a US ticker.
 */
export function detectMarket(code: string): MarketType {
  if (/^\d{6}$/.test(code)) {
    if (startsWithAny(code, A_SHARE_PREFIXES)) return 'A';
    if (startsWithAny(code, ETF_PREFIXES)) return 'ETF';
    if (startsWithAny(code, LOF_PREFIXES)) return 'LOF';
  }

  if (/^\d{5}$/.test(code)) {
    return 'HK';
  }

  return 'US';
}

export function isFund(market: MarketType): boolean {
  return market === 'ETF' || market === 'LOF';
}

export function marketLabel(market: MarketType): string {
  return MARKET_LABELS[market];
}

export function currencyOf(market: MarketType): { code: string; symbol: string } {
  return CURRENCIES[market];
}
