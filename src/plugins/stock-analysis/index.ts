import type { StockAnalysisConfig } from '../../config/schema.js';
import { CreditGate } from '../../services/credit-gate.js';
import { DifyClient } from '../../services/providers/dify.js';
import { StockDataClient, type MarketType, type StockSeries } from '../../services/providers/stock-data.js';
import { errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { DispatchGate, type RouteInvocation, type RouteReply } from '../dispatch.js';
import type { Plugin, PluginDeps } from '../types.js';
import { calculateIndicators, summarize } from './indicators.js';
import { STOCK_CODE_PATTERN, detectMarket } from './market.js';
import { buildDeepAnalysisQuery, formatReport, type StockReportInput } from './report.js';

const PLUGIN_NAME = 'stock_analysis';

export const BUSY_REPLY = '已有一个分析任务正在进行，请稍后再试。';
export const PROGRESS_REPLY = '正在分析股票数据，请稍候...';
export const DEEP_ANALYSIS_HEADER = '【AI 深度分析】';

/** Fewer bars than this on the first attempt triggers a one-year refetch */
const MIN_HISTORY_BARS = 60;
const EXTENDED_HISTORY_DAYS = 365;
const DAY_MS = 24 * 60 * 60 * 1000;

/** Dify end-user id for analysis requests */
const DIFY_USER = 'stock_analysis';

export interface StockAnalysisOptions {
  /** Clock for history windows and report timestamps */
  now?: () => Date;
}

export function notFoundReply(code: string): string {
  return `无法获取 ${code} 的数据，请确认代码是否正确。`;
}

export function indicatorFailureReply(code: string): string {
  return `无法计算 ${code} 的技术指标。`;
}

/**
 * Stock technical analysis.
 *
 *   分析 600519 / analyze AAPL
 *
 * One analysis runs per chat at a time.
 */
export function createStockAnalysisPlugin(
  config: StockAnalysisConfig,
  deps: PluginDeps,
  options: StockAnalysisOptions = {}
): Plugin {
  const now = options.now ?? (() => new Date());
  const data = new StockDataClient({
    baseUrl: config.dataBaseUrl,
    timeoutMs: deps.timeoutMs,
    usMarketId: config.usMarketId,
  });
  const dify = config.dify
    ? new DifyClient({ baseUrl: config.dify.baseUrl, apiKey: config.dify.apiKey, timeoutMs: deps.timeoutMs })
    : null;
  const inFlight = new Set<string>();

  async function fetchHistory(code: string, market: MarketType): Promise<StockSeries | null> {
    const to = now();
    const series = await data.fetchDailyBars(
      code,
      market,
      new Date(to.getTime() - config.historyDays * DAY_MS),
      to
    );

    if (series && series.bars.length < MIN_HISTORY_BARS && config.historyDays < EXTENDED_HISTORY_DAYS) {
      logger.debug('Short history, extending window', { code, bars: series.bars.length });
      return data.fetchDailyBars(code, market, new Date(to.getTime() - EXTENDED_HISTORY_DAYS * DAY_MS), to);
    }
    return series;
  }

  /**
   * Deep analysis text, or null when Dify is off or fails
   */
  async function deepAnalysis(query: string): Promise<string | null> {
    if (!dify) return null;
    try {
      const reply = await dify.ask(query, DIFY_USER);
      return reply.text;
    } catch (error) {
      logger.error('Deep analysis failed', { error: errorMessage(error) });
      return null;
    }
  }

  async function analyze({ query, reply }: RouteInvocation): Promise<RouteReply | null> {
    const code = query;
    const market = detectMarket(code);

    await reply(PROGRESS_REPLY);

    const series = await fetchHistory(code, market);
    if (!series || series.bars.length === 0) {
      return { text: notFoundReply(code), charge: false };
    }

    const indicators = calculateIndicators(series.bars.map((bar) => bar.close));
    const summary = summarize(series.bars, indicators);
    if (!summary) {
      return { text: indicatorFailureReply(code), charge: false };
    }

    const input: StockReportInput = { code, name: series.name, market, summary };
    const pendingAnalysis = deepAnalysis(buildDeepAnalysisQuery(input, indicators, series.bars));

    await reply(formatReport(input, now()));
    logger.info('Stock analysis sent', { code, market, score: summary.score });

    const answer = await pendingAnalysis;
    return answer ? { text: `${DEEP_ANALYSIS_HEADER}\n${answer}` } : null;
  }

  const gate = new DispatchGate({
    plugin: PLUGIN_NAME,
    credit: new CreditGate(PLUGIN_NAME, deps.ledger, config, deps.admins),
    routes: [
      {
        name: 'analyze',
        triggers: config.commands,
        accepts: (query) => STOCK_CODE_PATTERN.test(query),
        run: async (invocation) => {
          const chatId = invocation.message.chatId;
          if (inFlight.has(chatId)) {
            return { text: BUSY_REPLY, charge: false };
          }

          inFlight.add(chatId);
          try {
            return await analyze(invocation);
          } finally {
            inFlight.delete(chatId);
          }
        },
      },
    ],
  });

  return {
    name: PLUGIN_NAME,
    version: '1.0.0',
    description: '股票分析与投资建议',
    handleMessage: (message, ctx) => gate.handle(message, ctx.client),
    destroy: () => {
      inFlight.clear();
      return Promise.resolve();
    },
  };
}
