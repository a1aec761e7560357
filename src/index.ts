import { loadConfig } from './config/index.js';
import type { Config } from './config/schema.js';
import type { BotClient, ChatMessage, HandlerResult } from './host/types.js';
import { PluginChain } from './plugins/loader.js';
import type { Plugin, PluginDeps } from './plugins/types.js';
import { createFastGptPlugin } from './plugins/fastgpt.js';
import { createSiliconFlowPlugin } from './plugins/siliconflow.js';
import { createStockAnalysisPlugin } from './plugins/stock-analysis/index.js';
import { createResourceSearchPlugin } from './plugins/resource-search.js';
import { createNetdiskSearchPlugin } from './plugins/netdisk-search.js';
import { createVideoSearchPlugin } from './plugins/video-search.js';
import { SqliteCreditLedger, type CreditLedger } from './services/credit-ledger.js';
import { enableAuditLog, logger } from './utils/logger.js';

/**
 * WeChat bot plugins
 *
 * Command plugins for an XYBot-style host: FastGPT knowledge-base Q&A,
 * SiliconFlow chat, drawing and vision, stock analysis, resource search,
 * netdisk share search and video site search.
 * The host owns the transport; it hands every incoming message to
 * PluginHost.dispatch and supplies a BotClient for replies.
 */

export interface PluginHostOptions {
  client: BotClient;
  /** Credit ledger; defaults to a SQLite ledger at CREDIT_DB_PATH */
  ledger?: CreditLedger;
  /** Environment to read configuration from; defaults to process.env */
  env?: NodeJS.ProcessEnv;
}

export interface PluginHost {
  config: Config;
  dispatch: (message: ChatMessage) => Promise<HandlerResult>;
  getLoadedPlugins: () => string[];
  destroy: () => Promise<void>;
}

/**
 * Enabled plugins in dispatch order
 */
export function buildPlugins(config: Config, deps: PluginDeps): Plugin[] {
  const { fastgpt, siliconflow, stockAnalysis, resourceSearch, netdiskSearch, videoSearch } = config.plugins;
  const plugins: Plugin[] = [];

  if (fastgpt) plugins.push(createFastGptPlugin(fastgpt, deps));
  if (siliconflow) plugins.push(createSiliconFlowPlugin(siliconflow, deps));
  if (stockAnalysis) plugins.push(createStockAnalysisPlugin(stockAnalysis, deps));
  if (resourceSearch) plugins.push(createResourceSearchPlugin(resourceSearch, deps));
  if (netdiskSearch) plugins.push(createNetdiskSearchPlugin(netdiskSearch, deps));
  if (videoSearch) plugins.push(createVideoSearchPlugin(videoSearch, deps));

  return plugins;
}

/**
 * Load configuration and register every enabled plugin
 *
 * @throws ConfigurationError when the core settings are invalid
 */
export async function createPluginHost(options: PluginHostOptions): Promise<PluginHost> {
  const config = loadConfig(options.env ?? process.env);
  logger.level = config.core.logging.level;
  if (config.core.logging.auditLogPath) {
    enableAuditLog(config.core.logging.auditLogPath);
  }

  const ownedLedger = options.ledger ? null : new SqliteCreditLedger(config.core.creditDbPath);
  const ledger = options.ledger ?? ownedLedger;

  const chain = new PluginChain(options.client);
  const deps: PluginDeps = {
    ledger,
    admins: config.core.admins,
    timeoutMs: config.core.httpTimeoutSeconds * 1000,
  };

  for (const plugin of buildPlugins(config, deps)) {
    await chain.register(plugin);
  }

  logger.info('Plugin host ready', { plugins: chain.getLoadedPlugins() });

  return {
    config,
    dispatch: (message) => chain.dispatch(message),
    getLoadedPlugins: () => chain.getLoadedPlugins(),
    destroy: async () => {
      await chain.destroy();
      ownedLedger?.close();
      logger.info('Plugin host stopped');
    },
  };
}

export type { Attachment, BotClient, ChatMessage, HandlerResult } from './host/types.js';
export type { Plugin, PluginContext, PluginDeps } from './plugins/types.js';
export type { CommandRoute, RouteInvocation, RouteReply } from './plugins/dispatch.js';
export type { CreditLedger } from './services/credit-ledger.js';
export type { Config } from './config/schema.js';
export { SqliteCreditLedger } from './services/credit-ledger.js';
export { PluginChain } from './plugins/loader.js';
export { DispatchGate } from './plugins/dispatch.js';
export { AttachmentCache } from './core/attachment-cache.js';
export { TtlCache } from './core/ttl-cache.js';
export { matchCommand, normalizeContent } from './core/command-matcher.js';
export { ConfigurationError, InsufficientCreditError, ProviderError } from './utils/errors.js';
