import type { SiliconFlowConfig } from '../config/schema.js';
import { AttachmentCache } from '../core/attachment-cache.js';
import { CreditGate } from '../services/credit-gate.js';
import { SiliconFlowClient } from '../services/providers/siliconflow.js';
import { DispatchGate, type CommandRoute } from './dispatch.js';
import type { Plugin, PluginDeps } from './types.js';

const PLUGIN_NAME = 'siliconflow';

export const DEFAULT_VISION_QUESTION = '请描述这张图片的内容';

/**
 * SiliconFlow LLM, image generation and vision proxy.
 *
 *   sf <问题>          chat
 *   sf画图 <描述>       text-to-image
 *   (image) + sf识图    describe the last image sent in this chat
 *
 * Draw commands are matched before chat commands so "sf画图" is not read as
 * "sf" followed by a question.
 */
export function createSiliconFlowPlugin(config: SiliconFlowConfig, deps: PluginDeps): Plugin {
  const client = new SiliconFlowClient(
    {
      baseUrl: config.baseUrl,
      apiKey: config.apiKey,
      timeoutMs: deps.timeoutMs,
    },
    {
      chat: config.model,
      vision: config.visionModel,
      image: config.imageModel,
      maxTokens: config.maxTokens,
      temperature: config.temperature,
      imageSize: config.imageSize,
    }
  );

  const routes: CommandRoute[] = [];
  let cache: AttachmentCache | undefined;

  if (config.imageCommands.length > 0) {
    cache = new AttachmentCache({ ttlMs: config.imageTtlSeconds * 1000 });
    routes.push({
      name: 'vision',
      triggers: config.imageCommands,
      requiresAttachment: true,
      run: ({ query, attachment }) =>
        client.describeImage(attachment ?? '', query || DEFAULT_VISION_QUESTION),
    });
  }

  if (config.drawCommands.length > 0) {
    routes.push({
      name: 'draw',
      triggers: config.drawCommands,
      usage: `请输入图片描述，例如：${config.drawCommands[0] ?? ''} 一只在月光下的猫`,
      run: ({ query }) => client.generateImage(query),
    });
  }

  routes.push({
    name: 'chat',
    triggers: config.commands,
    usage: `请输入问题，例如：${config.commands[0] ?? ''} 你好`,
    run: ({ query }) => client.chat(query),
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
    description: '硅基流动 对话 / 画图 / 识图',
    handleMessage: (message, ctx) => gate.handle(message, ctx.client),
    destroy: () => {
      cache?.clear();
      return Promise.resolve();
    },
  };
}
