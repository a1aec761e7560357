import type { DailyBar } from '../../services/providers/stock-data.js';

/**
 * Technical indicator series, aligned with the input bars.
 * Positions without a full window hold NaN.
 */
export interface IndicatorSeries {
  rsi: number[];
  macd: number[];
  signal: number[];
  ma5: number[];
  ma10: number[];
  ma20: number[];
  /** Annualised 20-day volatility of daily returns, in percent */
  volatility: number[];
}

export type Trend = '上升' | '下降';
export type RsiSignal = '超买' | '超卖' | '中性';
export type MacdSignal = '买入' | '卖出';
export type VolumeTrend = '放量' | '缩量';

/**
 * Latest-bar reading of the indicators plus the composite score
 */
export interface TechnicalSummary {
  trend: Trend;
  volatility: number;
  rsi: number;
  rsiSignal: RsiSignal;
  macdSignal: MacdSignal;
  volumeTrend: VolumeTrend;
  /** 0-100 */
  score: number;
  latestPrice: number;
  latestChange: number;
  latestTurnover: number;
  ma5: number;
  ma10: number;
  ma20: number;
}

const RSI_WINDOW = 14;
const VOLATILITY_WINDOW = 20;
const TRADING_DAYS_PER_YEAR = 252;

/**
 * Bars needed before every indicator has a value on the last one
 */
export const MIN_BARS = VOLATILITY_WINDOW + 1;

function mean(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  let sum = 0;
  for (const value of values) sum += value;
  return sum / values.length;
}

/** Sample standard deviation */
function std(values: readonly number[]): number {
  if (values.length < 2) return NaN;
  const avg = mean(values);
  let squares = 0;
  for (const value of values) squares += (value - avg) ** 2;
  return Math.sqrt(squares / (values.length - 1));
}

/**
 * Trailing window statistic; NaN until the window is full or while it holds NaN
 */
function rolling(values: readonly number[], window: number, stat: (slice: number[]) => number): number[] {
  return values.map((_, i) => {
    if (i + 1 < window) return NaN;
    const slice = values.slice(i + 1 - window, i + 1);
    return slice.some(Number.isNaN) ? NaN : stat(slice);
  });
}

export function rollingMean(values: readonly number[], window: number): number[] {
  return rolling(values, window, mean);
}

/**
 * Exponential moving average seeded with the first value
 */
export function ema(values: readonly number[], span: number): number[] {
  const alpha = 2 / (span + 1);
  const out: number[] = [];
  let previous = NaN;

  for (const value of values) {
    previous = Number.isNaN(previous) ? value : alpha * value + (1 - alpha) * previous;
    out.push(previous);
  }
  return out;
}

/**
 * RSI over simple averages of gains and losses.
 * The first bar contributes a zero change.
 */
export function rsi(closes: readonly number[], window = RSI_WINDOW): number[] {
  const gains: number[] = [];
  const losses: number[] = [];

  closes.forEach((close, i) => {
    const delta = i === 0 ? 0 : close - (closes[i - 1] ?? close);
    gains.push(delta > 0 ? delta : 0);
    losses.push(delta < 0 ? -delta : 0);
  });

  const avgGain = rollingMean(gains, window);
  const avgLoss = rollingMean(losses, window);

  // loss 0 with gain > 0 gives 100; flat prices give NaN
  return avgGain.map((gain, i) => 100 - 100 / (1 + gain / (avgLoss[i] ?? NaN)));
}

/**
 * Daily returns; NaN on the first bar
 */
export function pctChange(values: readonly number[]): number[] {
  return values.map((value, i) => (i === 0 ? NaN : value / (values[i - 1] ?? NaN) - 1));
}

export function calculateIndicators(closes: readonly number[]): IndicatorSeries {
  const fast = ema(closes, 12);
  const slow = ema(closes, 26);
  const macd = fast.map((value, i) => value - (slow[i] ?? NaN));

  return {
    rsi: rsi(closes),
    macd,
    signal: ema(macd, 9),
    ma5: rollingMean(closes, 5),
    ma10: rollingMean(closes, 10),
    ma20: rollingMean(closes, 20),
    volatility: rolling(pctChange(closes), VOLATILITY_WINDOW, std).map(
      (value) => value * Math.sqrt(TRADING_DAYS_PER_YEAR) * 100
    ),
  };
}

function last(values: readonly number[]): number {
  return values[values.length - 1] ?? NaN;
}

/**
 * Read the indicators on the latest bar and score them
 *
 * @returns null when the series is too short for every indicator
 */
export function summarize(bars: readonly DailyBar[], series: IndicatorSeries): TechnicalSummary | null {
  const latest = bars[bars.length - 1];
  if (!latest || bars.length < MIN_BARS) {
    return null;
  }

  const ma5 = last(series.ma5);
  const ma10 = last(series.ma10);
  const ma20 = last(series.ma20);
  const rsiValue = last(series.rsi);
  const macd = last(series.macd);
  const signal = last(series.signal);
  const volatility = last(series.volatility);

  if (![ma5, ma10, ma20, rsiValue, macd, signal, volatility].every(Number.isFinite)) {
    return null;
  }

  const volumes = bars.map((bar) => bar.volume);
  const trend: Trend = ma5 > ma20 ? '上升' : '下降';
  const rsiSignal: RsiSignal = rsiValue > 70 ? '超买' : rsiValue < 30 ? '超卖' : '中性';
  const macdSignal: MacdSignal = macd > signal ? '买入' : '卖出';
  const volumeTrend: VolumeTrend = mean(volumes.slice(-5)) > mean(volumes.slice(-20)) ? '放量' : '缩量';

  let score = 0;
  if (trend === '上升') score += 30;
  if (rsiValue > 30 && rsiValue < 70) score += 20;
  if (macdSignal === '买入') score += 20;
  if (volumeTrend === '放量') score += 15;
  if (volatility < 30) score += 15;

  return {
    trend,
    volatility,
    rsi: rsiValue,
    rsiSignal,
    macdSignal,
    volumeTrend,
    score,
    latestPrice: latest.close,
    latestChange: latest.changePct,
    latestTurnover: latest.turnover,
    ma5,
    ma10,
    ma20,
  };
}
