import type { DailyBar, MarketType } from '../../services/providers/stock-data.js';
import type { IndicatorSeries, TechnicalSummary } from './indicators.js';
import { currencyOf, isFund, marketLabel } from './market.js';

export interface StockReportInput {
  code: string;
  name: string;
  market: MarketType;
  summary: TechnicalSummary;
}

export const RISK_NOTICE = '以上分析仅供参考，投资有风险，入市需谨慎。';

/**
 * Instructions appended to the data sent for AI deep analysis
 */
const DEEP_ANALYSIS_INSTRUCTIONS = `请根据以上数据进行深度分析，重点关注：

1. 技术面分析：
   - 结合K线形态和技术指标（RSI、MACD、均线系统）分析当前趋势
   - 分析成交量与价格的关系，判断趋势的可信度
   - 通过均线系统判断多空头排列情况

2. 趋势研判：
   - 基于历史数据分析近期支撑位和压力位
   - 结合RSI和MACD指标判断可能的趋势反转点
   - 评估趋势的强度和持续性

3. 投资风险提示：
   - 基于波动率和换手率分析当前风险水平
   - 结合技术指标给出风险预警信号
   - 评估当前价格位置的风险收益比

4. 具体操作建议：
   - 给出明确的操作方向（买入/卖出/观望）
   - 建议具体的买卖价格区间
   - 设置合理的止损位和目标价位

请结合所有数据，给出专业、具体且可操作的建议。`;

/** Trading days of indicator and price history sent for deep analysis */
const DEEP_ANALYSIS_DAYS = 20;

export function recommendation(score: number): string {
  if (score >= 80) return '强烈推荐买入';
  if (score >= 60) return '建议买入';
  if (score >= 40) return '建议观望';
  if (score >= 20) return '建议减持';
  return '建议卖出';
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * YYYY-MM-DD HH:MM:SS in local time
 */
export function formatTimestamp(date: Date): string {
  return (
    `${String(date.getFullYear())}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Plain-text analysis report
 */
export function formatReport(input: StockReportInput, now: Date = new Date()): string {
  const { code, name, market, summary } = input;
  const { symbol } = currencyOf(market);

  const lines = [`【${marketLabel(market)}分析报告】`, '', `代码: ${code}`];
  if (name) {
    lines.push(`名称: ${name}`);
  }
  lines.push(`分析日期: ${formatTimestamp(now)}`);

  lines.push(
    isFund(market)
      ? `最新净值: ${symbol}${summary.latestPrice.toFixed(4)}`
      : `最新价格: ${symbol}${summary.latestPrice.toFixed(2)}`,
    `涨跌幅: ${summary.latestChange.toFixed(2)}%`,
    `换手率: ${summary.latestTurnover.toFixed(2)}%`,
    '',
    '【技术指标概要】',
    `趋势: ${summary.trend}`,
    `波动率: ${summary.volatility.toFixed(2)}%`,
    `成交量趋势: ${summary.volumeTrend}`,
    `RSI指标: ${summary.rsi.toFixed(2)}`,
    `RSI信号: ${summary.rsiSignal}`,
    `MACD信号: ${summary.macdSignal}`,
    '',
    '【均线分析】',
    `5日均线: ${summary.ma5.toFixed(2)}`,
    `10日均线: ${summary.ma10.toFixed(2)}`,
    `20日均线: ${summary.ma20.toFixed(2)}`,
    '',
    '【投资建议】',
    `综合评分: ${String(summary.score)}/100`,
    `建议: ${recommendation(summary.score)}`,
    '',
    '【风险提示】',
    RISK_NOTICE
  );

  return lines.join('\n');
}

function trendLine(values: readonly number[]): string {
  return values
    .slice(-DEEP_ANALYSIS_DAYS)
    .map((value) => (Number.isFinite(value) ? value.toFixed(2) : '-'))
    .join(', ');
}

/**
 * Query for the AI deep analysis: market data, indicator trends and the
 * recent price history, followed by the analysis instructions
 */
export function buildDeepAnalysisQuery(
  input: StockReportInput,
  series: IndicatorSeries,
  bars: readonly DailyBar[]
): string {
  const { code, name, market, summary } = input;

  const lines = [
    '【股票数据分析请求】',
    '',
    '1. 基本信息：',
    `代码：${code}`,
    `名称：${name}`,
    `市场类型：${market}`,
    `货币单位：${currencyOf(market).code}`,
    '',
    '2. 市场数据：',
    `最新价格：${summary.latestPrice.toFixed(4)}`,
    `涨跌幅：${summary.latestChange.toFixed(2)}%`,
    `换手率：${summary.latestTurnover.toFixed(2)}%`,
    `趋势：${summary.trend}`,
    `波动率：${summary.volatility.toFixed(2)}%`,
    `成交量趋势：${summary.volumeTrend}`,
    '',
    '3. 技术指标：',
    `RSI(14)：${summary.rsi.toFixed(2)}`,
    `RSI信号：${summary.rsiSignal}`,
    `MACD信号：${summary.macdSignal}`,
    `MA5：${summary.ma5.toFixed(2)}`,
    `MA10：${summary.ma10.toFixed(2)}`,
    `MA20：${summary.ma20.toFixed(2)}`,
    '',
    `4. 技术指标趋势（最近${String(DEEP_ANALYSIS_DAYS)}个交易日）：`,
    `RSI趋势：${trendLine(series.rsi)}`,
    `MACD趋势：${trendLine(series.macd)}`,
    `MACD信号线：${trendLine(series.signal)}`,
    `MA5趋势：${trendLine(series.ma5)}`,
    `MA10趋势：${trendLine(series.ma10)}`,
    `MA20趋势：${trendLine(series.ma20)}`,
    `波动率趋势：${trendLine(series.volatility)}`,
    '',
    '5. 历史数据（近一个月交易日）：',
  ];

  for (const bar of bars.slice(-DEEP_ANALYSIS_DAYS)) {
    lines.push(
      `日期：${bar.date}, 开盘：${bar.open.toFixed(4)}, 收盘：${bar.close.toFixed(4)}, ` +
        `最高：${bar.high.toFixed(4)}, 最低：${bar.low.toFixed(4)}, ` +
        `成交量：${String(bar.volume)}, 涨跌幅：${bar.changePct.toFixed(2)}%`
    );
  }

  return `${lines.join('\n')}\n\n${DEEP_ANALYSIS_INSTRUCTIONS}`;
}
