import { describe, it, expect } from 'vitest';
import type { DailyBar } from '../../../src/services/providers/stock-data.js';
import {
  MIN_BARS,
  calculateIndicators,
  ema,
  pctChange,
  rollingMean,
  rsi,
  summarize,
} from '../../../src/plugins/stock-analysis/indicators.js';

function makeBars(closes: number[], volumeAt: (i: number) => number): DailyBar[] {
  return closes.map((close, i) => ({
    date: `2024-01-${String(i + 1).padStart(2, '0')}`,
    open: close,
    close,
    high: close + 1,
    low: close - 1,
    volume: volumeAt(i),
    amount: 0,
    amplitude: 0,
    changePct: 0.5,
    changeAmount: 0.5,
    turnover: 1.2,
  }));
}

function range(count: number, at: (i: number) => number): number[] {
  return Array.from({ length: count }, (_, i) => at(i));
}

describe('rollingMean', () => {
  it('should average trailing windows', () => {
    expect(rollingMean([1, 2, 3, 4], 2)).toEqual([NaN, 1.5, 2.5, 3.5]);
  });

  it('should stay NaN while the window holds NaN', () => {
    expect(rollingMean([NaN, 2, 4, 6], 2)).toEqual([NaN, NaN, 3, 5]);
  });
});

describe('ema', () => {
  it('should seed with the first value', () => {
    expect(ema([1, 2, 3], 3)).toEqual([1, 1.5, 2.25]);
  });
});

describe('rsi', () => {
  it('should be 100 for strictly rising prices', () => {
    const values = rsi(range(20, (i) => i + 1));

    expect(values[12]).toBeNaN();
    expect(values[13]).toBe(100);
    expect(values[19]).toBe(100);
  });

  it('should weigh average gains against average losses', () => {
    // seven +2 moves and seven -1 moves
    const closes = [10, 12, 11, 13, 12, 14, 13, 15, 14, 16, 15, 17, 16, 18, 17];

    expect(rsi(closes)[14]).toBeCloseTo(66.667, 3);
  });

  it('should be undefined for flat prices', () => {
    expect(rsi(range(15, () => 10))[14]).toBeNaN();
  });
});

describe('pctChange', () => {
  it('should compute daily returns', () => {
    const values = pctChange([100, 110, 99]);

    expect(values[0]).toBeNaN();
    expect(values[1]).toBeCloseTo(0.1, 10);
    expect(values[2]).toBeCloseTo(-0.1, 10);
  });
});

describe('calculateIndicators', () => {
  it('should align every series with the input', () => {
    const series = calculateIndicators(range(30, (i) => 100 + i));

    for (const values of Object.values(series)) {
      expect(values).toHaveLength(30);
    }
    expect(series.ma5[29]).toBe(127);
    expect(series.ma10[29]).toBe(124.5);
    expect(series.ma20[29]).toBe(119.5);
  });

  it('should give zero momentum and volatility for flat prices', () => {
    const series = calculateIndicators(range(30, () => 10));

    expect(series.macd[29]).toBe(0);
    expect(series.signal[29]).toBe(0);
    expect(series.volatility[29]).toBe(0);
    expect(series.volatility[19]).toBeNaN();
  });
});

describe('summarize', () => {
  it('should score a steady uptrend', () => {
    const closes = range(30, (i) => 100 + i);
    const bars = makeBars(closes, (i) => 1000 + i * 10);

    const summary = summarize(bars, calculateIndicators(closes));

    expect(summary).toMatchObject({
      trend: '上升',
      rsi: 100,
      rsiSignal: '超买',
      macdSignal: '买入',
      volumeTrend: '放量',
      score: 80,
      latestPrice: 129,
      latestChange: 0.5,
      latestTurnover: 1.2,
      ma5: 127,
      ma10: 124.5,
      ma20: 119.5,
    });
    expect(summary?.volatility).toBeLessThan(30);
  });

  it('should score a steady downtrend', () => {
    const closes = range(30, (i) => 200 - i);
    const bars = makeBars(closes, (i) => 2000 - i * 10);

    const summary = summarize(bars, calculateIndicators(closes));

    expect(summary).toMatchObject({
      trend: '下降',
      rsi: 0,
      rsiSignal: '超卖',
      macdSignal: '卖出',
      volumeTrend: '缩量',
      score: 15,
    });
  });

  it('should need enough bars', () => {
    const closes = range(MIN_BARS - 1, (i) => 100 + i);

    expect(summarize(makeBars(closes, () => 1000), calculateIndicators(closes))).toBeNull();
  });

  it('should give up when an indicator is undefined', () => {
    const closes = range(30, () => 10);

    expect(summarize(makeBars(closes, () => 1000), calculateIndicators(closes))).toBeNull();
  });
});
