import { z } from 'zod';
import { requestJson } from '../http.js';
import { ProviderError } from '../../utils/errors.js';
import { parseProviderResponse } from './types.js';

export type MarketType = 'A' | 'ETF' | 'LOF' | 'HK' | 'US';

/**
 * One trading day, forward-adjusted
 */
export interface DailyBar {
  date: string;
  open: number;
  close: number;
  high: number;
  low: number;
  volume: number;
  amount: number;
  amplitude: number;
  /** Percent change against the previous close */
  changePct: number;
  changeAmount: number;
  /** Turnover rate in percent */
  turnover: number;
}

export interface StockSeries {
  code: string;
  name: string;
  market: MarketType;
  bars: DailyBar[];
}

export interface StockDataOptions {
  baseUrl: string;
  timeoutMs: number;
  /** Market id used for US tickers */
  usMarketId: number;
}

const KlineResponseSchema = z.object({
  rc: z.number().optional(),
  data: z
    .object({
      code: z.string(),
      name: z.string(),
      klines: z.array(z.string()),
    })
    .nullable(),
});

/**
 * Kline field order requested through fields2=f51..f61
 */
const KLINE_FIELDS = 'f51,f52,f53,f54,f55,f56,f57,f58,f59,f60,f61';

function formatDay(date: Date): string {
  const y = String(date.getFullYear());
  const m = String(date.getMonth() + 1).padStart(2, '0');
  const d = String(date.getDate()).padStart(2, '0');
  return `${y}${m}${d}`;
}

function toNumber(value: string | undefined): number {
  if (value === undefined || value === '' || value === '-') return 0;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : 0;
}

/**
 * Parse a "date,open,close,high,low,volume,amount,amplitude,pct,chg,turnover" line
 *
 * @returns The bar, or null when the line has too few fields
 */
export function parseKline(line: string): DailyBar | null {
  const fields = line.split(',');
  if (fields.length < 6) {
    return null;
  }

  const [date, open, close, high, low, volume, amount, amplitude, changePct, changeAmount, turnover] = fields;
  if (!date) {
    return null;
  }

  return {
    date,
    open: toNumber(open),
    close: toNumber(close),
    high: toNumber(high),
    low: toNumber(low),
    volume: toNumber(volume),
    amount: toNumber(amount),
    amplitude: toNumber(amplitude),
    changePct: toNumber(changePct),
    changeAmount: toNumber(changeAmount),
    turnover: toNumber(turnover),
  };
}

/**
 * Daily price history from an Eastmoney-style kline endpoint
 */
export class StockDataClient {
  readonly name = 'stock-data';

  private options: StockDataOptions;

  constructor(options: StockDataOptions) {
    this.options = options;
  }

  /**
   * Security id understood by the kline endpoint: "<market>.<code>"
   */
  secid(code: string, market: MarketType): string {
    switch (market) {
      case 'HK':
        return `116.${code}`;
      case 'US':
        return `${String(this.options.usMarketId)}.${code.toUpperCase()}`;
      default:
        // Shanghai listings start with 5 (funds) or 6 (stocks)
        return `${code.startsWith('5') || code.startsWith('6') ? '1' : '0'}.${code}`;
    }
  }

  /**
   * Fetch forward-adjusted daily bars for [from, to]
   *
   * @returns The series, or null when the code is unknown to the provider
   * @throws ProviderError on transport or schema failure
   */
  async fetchDailyBars(code: string, market: MarketType, from: Date, to: Date): Promise<StockSeries | null> {
    const body = await requestJson({
      provider: this.name,
      url: `${this.options.baseUrl}/api/qt/stock/kline/get`,
      method: 'GET',
      timeoutMs: this.options.timeoutMs,
      query: {
        secid: this.secid(code, market),
        fields1: 'f1,f2,f3,f4,f5,f6',
        fields2: KLINE_FIELDS,
        klt: '101',
        fqt: '1',
        beg: formatDay(from),
        end: formatDay(to),
      },
    });

    const parsed = parseProviderResponse(this.name, KlineResponseSchema, body);
    if (!parsed.data) {
      return null;
    }

    const bars: DailyBar[] = [];
    for (const line of parsed.data.klines) {
      const bar = parseKline(line);
      if (bar) {
        bars.push(bar);
      }
    }

    if (bars.length === 0 && parsed.data.klines.length > 0) {
      throw new ProviderError(this.name, 'Unparseable kline data');
    }

    return {
      code: parsed.data.code,
      name: parsed.data.name,
      market,
      bars,
    };
  }
}
