import type { VideoSearchConfig } from '../config/schema.js';
import { TtlCache } from '../core/ttl-cache.js';
import { CreditGate } from '../services/credit-gate.js';
import { NO_PLOT, VideoSiteClient, type VideoEntry } from '../services/providers/video-site.js';
import type { ChatMessage, HandlerResult } from '../host/types.js';
import { DispatchGate, type CommandRoute } from './dispatch.js';
import type { Plugin, PluginDeps } from './types.js';

const PLUGIN_NAME = 'video_search';

export const NO_RESULTS_TO_PICK = '请先搜索影视剧，再获取详情';

export function searchUsage(command: string): string {
  return `请输入要搜索的影视剧名称，如：${command} 滤镜`;
}

export function pickUsage(command: string): string {
  return `请输入正确的编号，如：${command}# 1`;
}

function actorList(actors: readonly string[]): string {
  const shown = actors.slice(0, 3).join('、');
  return actors.length > 3 ? `${shown}等` : shown;
}

/**
 * Numbered preview of the results; picking one shows its play link
 */
export function formatPreview(
  keyword: string,
  results: readonly VideoEntry[],
  command: string,
  options: { maxResults: number; enableEmoji: boolean }
): string {
  const emoji = options.enableEmoji;
  const lines = [`${emoji ? '🔍 ' : ''}找到 ${String(results.length)} 条与"${keyword}"相关的内容`, ''];

  results.slice(0, options.maxResults).forEach((result, i) => {
    lines.push(
      `【${String(i + 1)}】${result.title}`,
      `   ${emoji ? '👨‍👩‍👧‍👦 ' : ''}主演: ${actorList(result.actors)}`,
      emoji ? `   📆 ${result.year} | 🌍 ${result.area}` : `   ${result.year} | ${result.area}`,
      ''
    );
  });

  if (results.length > options.maxResults) {
    lines.push(
      `还有 ${String(results.length - options.maxResults)} 条结果未显示...`,
      '输入更精确的关键词可以获得更准确的结果',
      ''
    );
  }

  lines.push(`${emoji ? '📌 ' : ''}获取链接请发送: ${command}# 编号 (例如: ${command}# 1)`);
  return lines.join('\n');
}

export function formatDetail(result: VideoEntry, playerPrefix: string, enableEmoji: boolean): string {
  const playLink = result.playUrl ? `${playerPrefix}${result.playUrl}` : '暂无';
  const lines = enableEmoji
    ? [
        `🎬 【${result.title}】`,
        '',
        `📺 播放链接: ${playLink}`,
        '',
        `👨‍👩‍👧‍👦 主演: ${actorList(result.actors)}`,
        `📆 年份: ${result.year} | 🌍 地区: ${result.area}`,
      ]
    : [
        `【${result.title}】`,
        '',
        `播放链接: ${playLink}`,
        '',
        `主演: ${actorList(result.actors)}`,
        `年份: ${result.year} | 地区: ${result.area}`,
      ];

  if (result.plot !== NO_PLOT) {
    lines.push('', `${enableEmoji ? '📝 ' : ''}简介: ${result.plot}`);
  }
  return lines.join('\n');
}

/**
 * Video site search in two steps.
 *
 *   TVS <片名>   search and list numbered results
 *   TVS# <编号>  play link and details of one result
 *
 * Results are kept per chat and sender until they expire.
 */
export function createVideoSearchPlugin(config: VideoSearchConfig, deps: PluginDeps): Plugin {
  const client = new VideoSiteClient({
    baseUrl: config.baseUrl,
    timeoutMs: config.timeoutSeconds * 1000,
  });
  const searches = new TtlCache<VideoEntry[]>({ ttlMs: config.cacheTtlSeconds * 1000 });
  const command = config.commands[0] ?? 'TVS';

  function searchKey(message: ChatMessage): string {
    return `${message.chatId}:${message.senderId}`;
  }

  function inScope(message: ChatMessage): boolean {
    if (config.groupsOnly && !message.isGroup) {
      return false;
    }
    return config.allowedGroups.length === 0 || config.allowedGroups.includes(message.chatId);
  }

  const routes: CommandRoute[] = [
    {
      name: 'pick',
      triggers: config.commands.map((c) => `${c}#`),
      usage: pickUsage(command),
      free: true,
      run: ({ query, message }) => {
        if (!/^\d+$/.test(query)) {
          return Promise.resolve({ text: pickUsage(command) });
        }

        const results = searches.get(searchKey(message));
        if (!results) {
          return Promise.resolve({ text: NO_RESULTS_TO_PICK });
        }

        const index = parseInt(query, 10);
        const result = results[index - 1];
        if (index < 1 || result === undefined) {
          return Promise.resolve({ text: `无效的编号，请输入1-${String(results.length)}之间的数字` });
        }

        return Promise.resolve({ text: formatDetail(result, config.playerPrefix, config.enableEmoji) });
      },
    },
    {
      name: 'search',
      triggers: config.commands,
      usage: searchUsage(command),
      run: async ({ query, message }) => {
        const results = await client.search(query);
        if (results.length === 0) {
          return { text: `未找到与"${query}"相关的影视资源`, charge: false };
        }

        searches.put(searchKey(message), results);
        return { text: formatPreview(query, results, command, config) };
      },
    },
  ];

  const gate = new DispatchGate({
    plugin: PLUGIN_NAME,
    routes,
    credit: new CreditGate(PLUGIN_NAME, deps.ledger, config, deps.admins),
  });

  return {
    name: PLUGIN_NAME,
    version: '1.0.0',
    description: '影视站点搜索',
    handleMessage: (message, ctx) =>
      inScope(message) ? gate.handle(message, ctx.client) : Promise.resolve<HandlerResult>('not-handled'),
    destroy: () => {
      searches.clear();
      return Promise.resolve();
    },
  };
}
