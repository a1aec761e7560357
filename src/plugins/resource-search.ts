import type { ResourceSearchConfig } from '../config/schema.js';
import { CreditGate } from '../services/credit-gate.js';
import { ResourceSearchClient, type ResourceItem } from '../services/providers/resource-search.js';
import { DispatchGate, type CommandRoute, type RouteReply } from './dispatch.js';
import type { Plugin, PluginDeps } from './types.js';

const PLUGIN_NAME = 'resource_search';

export const SEARCH_USAGE = '请输入要搜索的内容\n例如：搜三体';
export const ALL_SEARCH_NOTICE = '🔍 正在进行全网搜索，请稍等30秒...\n期间请勿重复发送搜索';
export const FALLBACK_NOTICE = '💡 普通搜索未找到结果，正在尝试全网搜索，请稍等30秒...\n期间请勿重复发送搜索';

type SearchKind = 'normal' | 'all';

const RESULT_STYLE: Record<SearchKind, { count: string; item: string; footer: string[] }> = {
  normal: {
    count: '📑',
    item: '🎬',
    footer: ['💡提示:点击链接即可获取资源', '没想要资源？请尝试：全网搜XX'],
  },
  all: {
    count: '🌐️',
    item: '🌐️',
    footer: ['🌐️资源来源网络，30分钟后删除，请及时转存'],
  },
};

export function buildHelpText(config: ResourceSearchConfig): string {
  return [
    '资源搜索插件使用说明:',
    '',
    '1. 支持的命令格式：',
    ...config.commands.map((command) => `- ${command} [关键词]`),
    '',
    '2. 使用示例：',
    '搜 三体',
    '全网搜 流浪地球',
    '',
    '💡 提示：点击链接即可获取资源',
  ].join('\n');
}

export function notFoundText(keyword: string): string {
  return [
    `💭 抱歉，未找到与"${keyword}"相关的资源`,
    '💡 建议：',
    '1. 尝试更换关键词',
    '2. 确保名称输入正确',
    '3. 使用"全网搜"命令重新搜索',
  ].join('\n');
}

/**
 * Result list: header with the total, then at most maxResults entries
 */
export function formatResults(keyword: string, items: readonly ResourceItem[], kind: SearchKind, maxResults: number): string {
  const style = RESULT_STYLE[kind];
  const blocks = [
    `🔍 搜索结果 - ${keyword}\n${style.count} 共找到 ${String(items.length)} 个相关资源`,
    ...items.slice(0, maxResults).map((item) => `${style.item} ${item.title}\n🔗 资源链接：${item.url}`),
    ...style.footer,
  ];
  return blocks.join('\n\n');
}

/**
 * Resource search.
 *
 *   搜 <关键词>      indexed search, falling back to the whole web
 *   全网搜 <关键词>   whole-web search
 *   搜索帮助          usage
 */
export function createResourceSearchPlugin(config: ResourceSearchConfig, deps: PluginDeps): Plugin {
  const client = new ResourceSearchClient({
    apiUrl: config.apiUrl,
    timeoutMs: config.timeoutSeconds * 1000,
  });

  function results(keyword: string, items: ResourceItem[], kind: SearchKind): RouteReply {
    if (items.length === 0) {
      return { text: notFoundText(keyword), charge: false };
    }
    return { text: formatResults(keyword, items, kind, config.maxResults) };
  }

  const routes: CommandRoute[] = [];

  if (config.helpCommands.length > 0) {
    routes.push({
      name: 'help',
      triggers: config.helpCommands,
      free: true,
      accepts: (query) => query === '',
      run: () => Promise.resolve({ text: buildHelpText(config) }),
    });
  }

  if (config.allSearchCommands.length > 0) {
    routes.push({
      name: 'all-search',
      triggers: config.allSearchCommands,
      usage: SEARCH_USAGE,
      run: async ({ query, notify }) => {
        await notify(ALL_SEARCH_NOTICE);
        return results(query, await client.searchAll(query), 'all');
      },
    });
  }

  routes.push({
    name: 'search',
    triggers: config.commands,
    usage: SEARCH_USAGE,
    run: async ({ query, notify }) => {
      const items = await client.search(query);
      if (items.length > 0) {
        return results(query, items, 'normal');
      }

      await notify(FALLBACK_NOTICE);
      return results(query, await client.searchAll(query), 'all');
    },
  });

  const gate = new DispatchGate({
    plugin: PLUGIN_NAME,
    routes,
    credit: new CreditGate(PLUGIN_NAME, deps.ledger, config, deps.admins),
  });

  return {
    name: PLUGIN_NAME,
    version: '1.0.0',
    description: '影视资源搜索',
    handleMessage: (message, ctx) => gate.handle(message, ctx.client),
  };
}
