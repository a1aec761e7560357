import type { FastGptConfig } from '../config/schema.js';
import { AttachmentCache } from '../core/attachment-cache.js';
import { CreditGate } from '../services/credit-gate.js';
import { FastGptClient } from '../services/providers/fastgpt.js';
import { DispatchGate, type CommandRoute } from './dispatch.js';
import type { Plugin, PluginDeps } from './types.js';

const PLUGIN_NAME = 'fastgpt';

/** Question sent with an image when the command carries none */
export const DEFAULT_IMAGE_QUESTION = '请分析这张图片';

/**
 * FastGPT knowledge-base Q&A.
 *
 *   fastgpt <问题>      ask the knowledge base
 *   (image) + 分析图片   ask about the last image sent in this chat
 */
export function createFastGptPlugin(config: FastGptConfig, deps: PluginDeps): Plugin {
  const client = new FastGptClient({
    baseUrl: config.baseUrl,
    apiKey: config.apiKey,
    timeoutMs: deps.timeoutMs,
  });

  const routes: CommandRoute[] = [];
  let cache: AttachmentCache | undefined;

  if (config.imageCommands.length > 0) {
    cache = new AttachmentCache({ ttlMs: config.imageTtlSeconds * 1000 });
    routes.push({
      name: 'image',
      triggers: config.imageCommands,
      requiresAttachment: true,
      run: ({ query, attachment, message }) =>
        client.ask({
          question: query || DEFAULT_IMAGE_QUESTION,
          image: attachment,
          chatId: message.chatId,
        }),
    });
  }

  routes.push({
    name: 'ask',
    triggers: config.commands,
    usage: `请输入问题，例如：${config.commands[0] ?? ''} 你的问题`,
    run: ({ query, message }) => client.ask({ question: query, chatId: message.chatId }),
  });

  const gate = new DispatchGate({
    plugin: PLUGIN_NAME,
    routes,
    cache,
    credit: new CreditGate(PLUGIN_NAME, deps.ledger, config, deps.admins),
  });

  return {
    name: PLUGIN_NAME,
    version: '1.0.0',
    description: 'FastGPT 知识库问答',
    handleMessage: (message, ctx) => gate.handle(message, ctx.client),
    destroy: () => {
      cache?.clear();
      return Promise.resolve();
    },
  };
}
