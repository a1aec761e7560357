import type { NetdiskSearchConfig } from '../config/schema.js';
import { CreditGate } from '../services/credit-gate.js';
import { NetdiskSearchClient, type DiskType, type ShareLink } from '../services/providers/netdisk-search.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { DispatchGate, type CommandRoute, type RouteReply } from './dispatch.js';
import type { Plugin, PluginDeps } from './types.js';

const PLUGIN_NAME = 'netdisk_search';

export const SEARCHING_NOTICE = '正在搜索，请稍等...';
export const NOT_FOUND_REPLY = '未找到，可换个关键词尝试哦~\n⚠️宁少写，不多写、错写~';
const CLOSING_LINE = '欢迎使用！如果喜欢可以喊你的朋友一起来哦';

const DISK_LABEL: Record<DiskType, string> = {
  QUARK: '夸克',
  BDY: '百度云',
};

export function formatShareLinks(keyword: string, type: DiskType, links: readonly ShareLink[]): string {
  return [
    `【${keyword}】${DISK_LABEL[type]}资源搜索结果：`,
    ...links.map((link, i) => `==========\n${String(i + 1)}.${link.title}\n${link.url}`),
    '',
    CLOSING_LINE,
  ].join('\n');
}

type LinkSource = () => Promise<ShareLink[]>;

/**
 * Netdisk share search.
 *
 *   夸克搜索 <名称>     Quark shares, expired ones dropped
 *   百度云搜索 <名称>   Baidu shares
 *   外部搜索 <名称>     the configured default disk
 */
export function createNetdiskSearchPlugin(config: NetdiskSearchConfig, deps: PluginDeps): Plugin {
  const client = new NetdiskSearchClient({
    searchUrl: config.searchUrl,
    fallbackUrl: config.fallbackUrl,
    shareCheckUrl: config.shareCheckUrl,
    timeoutMs: config.timeoutSeconds * 1000,
  });

  /**
   * Links from the first source that yields any, deduplicated by URL.
   * A failing source is skipped unless every source failed.
   */
  async function collect(type: DiskType, sources: LinkSource[]): Promise<ShareLink[]> {
    const seen = new Set<string>();
    let firstError: unknown;
    let anySucceeded = false;

    for (const source of sources) {
      let candidates: ShareLink[];
      try {
        candidates = await source();
        anySucceeded = true;
      } catch (error) {
        logger.warn('Netdisk source failed', { plugin: PLUGIN_NAME, error: errorMessage(error) });
        firstError ??= error;
        continue;
      }

      const links: ShareLink[] = [];
      for (const link of candidates) {
        if (links.length >= config.maxResults) break;
        if (seen.has(link.url)) continue;
        seen.add(link.url);

        if (type === 'QUARK' && config.verifyShares && !(await client.isShareAlive(link.url))) {
          continue;
        }
        links.push(link);
      }

      if (links.length > 0) {
        return links;
      }
    }

    if (!anySucceeded && firstError !== undefined) {
      throw firstError;
    }
    return [];
  }

  function searchRoute(name: string, triggers: readonly string[], type: DiskType): CommandRoute {
    return {
      name,
      triggers,
      usage: config.commandFormat,
      run: async ({ query, notify }): Promise<RouteReply> => {
        await notify(SEARCHING_NOTICE);

        const sources: LinkSource[] = [() => client.search(query, type)];
        if (type === 'QUARK') {
          sources.push(() => client.searchIndex(query));
        }

        const links = await collect(type, sources);
        logger.info('Netdisk search finished', { plugin: PLUGIN_NAME, type, found: links.length });

        if (links.length === 0) {
          return { text: NOT_FOUND_REPLY, charge: false };
        }
        return { text: formatShareLinks(query, type, links) };
      },
    };
  }

  const routes: CommandRoute[] = [];
  if (config.quarkCommands.length > 0) {
    routes.push(searchRoute('quark', config.quarkCommands, 'QUARK'));
  }
  if (config.baiduCommands.length > 0) {
    routes.push(searchRoute('baidu', config.baiduCommands, 'BDY'));
  }
  routes.push(searchRoute('search', config.commands, config.defaultType));

  const gate = new DispatchGate({
    plugin: PLUGIN_NAME,
    routes,
    credit: new CreditGate(PLUGIN_NAME, deps.ledger, config, deps.admins),
  });

  return {
    name: PLUGIN_NAME,
    version: '1.0.0',
    description: '网盘资源搜索',
    handleMessage: (message, ctx) => gate.handle(message, ctx.client),
  };
}
