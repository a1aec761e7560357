import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { BotClient, ChatMessage } from '../../../src/host/types.js';
import type { StockAnalysisConfig } from '../../../src/config/schema.js';
import type { PluginContext } from '../../../src/plugins/types.js';

vi.mock('../../../src/utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
  auditLog: vi.fn(),
}));

const {
  createStockAnalysisPlugin,
  BUSY_REPLY,
  DEEP_ANALYSIS_HEADER,
  PROGRESS_REPLY,
  indicatorFailureReply,
  notFoundReply,
} = await import('../../../src/plugins/stock-analysis/index.js');
const { SqliteCreditLedger } = await import('../../../src/services/credit-ledger.js');
const { logger } = await import('../../../src/utils/logger.js');

const USER = 'wxid_user';
const DATA_URL = 'https://quote.example.com';
const DIFY_URL = 'https://dify.example.com/v1';

const mockFetch = vi.fn<(url: string, init: RequestInit) => Promise<Response>>();

function json(body: unknown): Response {
  return new Response(JSON.stringify(body), { status: 200 });
}

/**
 * Rising daily closes 100, 101, ... with rising volume
 */
function klines(count: number): Response {
  const lines = Array.from({ length: count }, (_, i) => {
    const date = new Date(Date.UTC(2024, 0, 2) + i * 86_400_000).toISOString().slice(0, 10);
    const close = 100 + i;
    return [date, close - 0.5, close, close + 1, close - 1, 1000 + i * 10, 1_000_000, 2, 0.63, 0.99, 1.25]
      .map(String)
      .join(',');
  });
  return json({ rc: 0, data: { code: '600519', name: '贵州茅台', klines: lines } });
}

function mockClient() {
  return {
    sendText: vi.fn<BotClient['sendText']>().mockResolvedValue(undefined),
    sendAt: vi.fn<BotClient['sendAt']>().mockResolvedValue(undefined),
    sendImage: vi.fn<BotClient['sendImage']>().mockResolvedValue(undefined),
  };
}

function privateMessage(content: string): ChatMessage {
  return { chatId: USER, senderId: USER, content, isGroup: false };
}

function requestedParams(index: number): URLSearchParams {
  return new URL(mockFetch.mock.calls[index][0]).searchParams;
}

const baseConfig: StockAnalysisConfig = {
  commands: ['分析', 'analyze'],
  imageCommands: [],
  price: 5,
  adminIgnore: true,
  whitelistIgnore: true,
  dataBaseUrl: DATA_URL,
  historyDays: 180,
  usMarketId: 105,
};

const now = () => new Date(2024, 5, 3, 10, 0, 0);

describe('stock analysis plugin', () => {
  let ledger: InstanceType<typeof SqliteCreditLedger>;
  let client: ReturnType<typeof mockClient>;
  let ctx: PluginContext;

  function createPlugin(config: StockAnalysisConfig = baseConfig) {
    return createStockAnalysisPlugin(config, { ledger, admins: [], timeoutMs: 1000 }, { now });
  }

  function sentTexts(): string[] {
    return client.sendText.mock.calls.map(([, text]) => text);
  }

  beforeEach(() => {
    vi.clearAllMocks();
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);

    ledger = new SqliteCreditLedger(':memory:');
    ledger.addPoints(USER, 10);
    client = mockClient();
    ctx = { client, name: 'stock_analysis', version: '1.0.0' };
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    ledger.close();
  });

  it('should send progress and the report, then charge', async () => {
    mockFetch.mockResolvedValueOnce(klines(60));

    const result = await createPlugin().handleMessage(privateMessage('分析 600519'), ctx);

    expect(result).toBe('handled');
    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(mockFetch.mock.calls[0][0].startsWith(`${DATA_URL}/api/qt/stock/kline/get?`)).toBe(true);
    expect(requestedParams(0).get('secid')).toBe('1.600519');
    expect(requestedParams(0).get('beg')).toBe('20231206');
    expect(requestedParams(0).get('end')).toBe('20240603');

    const texts = sentTexts();
    expect(texts).toHaveLength(2);
    expect(texts[0]).toBe(PROGRESS_REPLY);

    const report = texts[1].split('\n');
    expect(report.slice(0, 8)).toEqual([
      '【A股分析报告】',
      '',
      '代码: 600519',
      '名称: 贵州茅台',
      '分析日期: 2024-06-03 10:00:00',
      '最新价格: ¥159.00',
      '涨跌幅: 0.63%',
      '换手率: 1.25%',
    ]);
    expect(report).toContain('综合评分: 80/100');
    expect(report).toContain('建议: 强烈推荐买入');
    expect(ledger.getPoints(USER)).toBe(5);
  });

  it('should refetch a full year when the history is short', async () => {
    mockFetch.mockResolvedValueOnce(klines(30)).mockResolvedValueOnce(klines(60));

    await createPlugin().handleMessage(privateMessage('分析 600519'), ctx);

    expect(mockFetch).toHaveBeenCalledTimes(2);
    expect(requestedParams(1).get('beg')).toBe('20230604');
    expect(sentTexts()[1]).toContain('最新价格: ¥159.00');
  });

  it('should use the configured US market id', async () => {
    mockFetch.mockResolvedValueOnce(klines(60));

    await createPlugin().handleMessage(privateMessage('analyze AAPL'), ctx);

    expect(requestedParams(0).get('secid')).toBe('105.AAPL');
    expect(sentTexts()[1].split('\n')[0]).toBe('【美股分析报告】');
    expect(sentTexts()[1]).toContain('最新价格: $159.00');
  });

  it('should report unknown codes without charging', async () => {
    mockFetch.mockResolvedValueOnce(json({ rc: 0, data: null }));

    const result = await createPlugin().handleMessage(privateMessage('分析 600999'), ctx);

    expect(result).toBe('handled');
    expect(sentTexts()).toEqual([PROGRESS_REPLY, notFoundReply('600999')]);
    expect(ledger.getPoints(USER)).toBe(10);
  });

  it('should report too-short histories without charging', async () => {
    mockFetch.mockResolvedValueOnce(klines(10)).mockResolvedValueOnce(klines(10));

    await createPlugin().handleMessage(privateMessage('分析 600519'), ctx);

    expect(sentTexts()).toEqual([PROGRESS_REPLY, indicatorFailureReply('600519')]);
    expect(ledger.getPoints(USER)).toBe(10);
  });

  it('should leave other text alone', async () => {
    const plugin = createPlugin();

    await expect(plugin.handleMessage(privateMessage('分析图片'), ctx)).resolves.toBe('not-handled');
    await expect(plugin.handleMessage(privateMessage('分析 一下 这个'), ctx)).resolves.toBe('not-handled');
    await expect(plugin.handleMessage(privateMessage('分析'), ctx)).resolves.toBe('not-handled');
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('should run one analysis per chat at a time', async () => {
    let release: (response: Response) => void = () => undefined;
    const pendingHistory = new Promise<Response>((resolve) => {
      release = resolve;
    });
    mockFetch.mockReturnValueOnce(pendingHistory);
    const plugin = createPlugin();

    const first = plugin.handleMessage(privateMessage('分析 600519'), ctx);
    const second = await plugin.handleMessage(privateMessage('分析 600519'), ctx);

    expect(second).toBe('handled');
    expect(sentTexts()).toContain(BUSY_REPLY);

    release(klines(60));
    await expect(first).resolves.toBe('handled');
    expect(ledger.getPoints(USER)).toBe(5);
  });

  it('should surface data provider failures', async () => {
    mockFetch.mockResolvedValueOnce(new Response('bad gateway', { status: 502 }));

    const result = await createPlugin().handleMessage(privateMessage('分析 600519'), ctx);

    expect(result).toBe('handled-with-error');
    expect(sentTexts()).toEqual([PROGRESS_REPLY, '处理请求时出现错误，请稍后再试。']);
    expect(ledger.getPoints(USER)).toBe(10);
  });

  describe('deep analysis', () => {
    const withDify: StockAnalysisConfig = {
      ...baseConfig,
      dify: { apiKey: 'test-secret', baseUrl: DIFY_URL },
    };

    it('should append the AI answer as the final reply', async () => {
      mockFetch.mockImplementation((url) =>
        Promise.resolve(url.startsWith(DIFY_URL) ? json({ answer: ' 建议逢低布局 ' }) : klines(60))
      );

      const result = await createPlugin(withDify).handleMessage(privateMessage('分析 600519'), ctx);

      expect(result).toBe('handled');
      const texts = sentTexts();
      expect(texts).toHaveLength(3);
      expect(texts[2]).toBe(`${DEEP_ANALYSIS_HEADER}\n建议逢低布局`);

      const [difyUrl, difyInit] = mockFetch.mock.calls[1];
      expect(difyUrl).toBe(`${DIFY_URL}/chat-messages`);
      const body: unknown = JSON.parse(String(difyInit.body));
      expect(body).toMatchObject({ inputs: {}, response_mode: 'blocking', user: 'stock_analysis' });
      expect(body).toHaveProperty('query', expect.stringMatching(/^【股票数据分析请求】\n/));
      expect(ledger.getPoints(USER)).toBe(5);
    });

    it('should still deliver the report when the AI call fails', async () => {
      mockFetch.mockImplementation((url) =>
        Promise.resolve(url.startsWith(DIFY_URL) ? new Response('', { status: 500 }) : klines(60))
      );

      const result = await createPlugin(withDify).handleMessage(privateMessage('分析 600519'), ctx);

      expect(result).toBe('handled');
      expect(sentTexts()).toHaveLength(2);
      expect(logger.error).toHaveBeenCalledWith('Deep analysis failed', { error: expect.any(String) });
      expect(ledger.getPoints(USER)).toBe(5);
    });
  });
});
