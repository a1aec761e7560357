import type { Plugin, PluginContext } from './types.js';
import { isValidPlugin } from './types.js';
import type { BotClient, ChatMessage, HandlerResult } from '../host/types.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Lifecycle timeouts (in milliseconds)
 */
const INIT_TIMEOUT_MS = 10_000;
const DESTROY_TIMEOUT_MS = 5_000;

interface LoadedPlugin {
  plugin: Plugin;
  context: PluginContext;
}

/**
 * Wrap a promise with a timeout
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  operation: string
): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new Error(`${operation} timed out after ${String(ms)}ms`));
    }, ms);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    if (timeoutId !== undefined) clearTimeout(timeoutId);
  }
}

/**
 * Ordered plugin chain.
 *
 * Each message goes to the plugins in registration order until one of them
 * returns 'handled' or 'handled-with-error'.
 */
export class PluginChain {
  private loaded: LoadedPlugin[] = [];
  private client: BotClient;

  constructor(client: BotClient) {
    this.client = client;
  }

  /**
   * Register a plugin. Loading is atomic: a plugin whose structure is invalid,
   * whose name is taken or whose init() fails or times out is skipped.
   *
   * @returns true when the plugin was added
   */
  async register(candidate: unknown): Promise<boolean> {
    if (!isValidPlugin(candidate)) {
      logger.warn('Plugin has invalid structure, skipping');
      return false;
    }

    const plugin = candidate;

    if (this.loaded.some((entry) => entry.plugin.name === plugin.name)) {
      logger.warn('Duplicate plugin name, skipping', { name: plugin.name });
      return false;
    }

    const context: PluginContext = {
      client: this.client,
      name: plugin.name,
      version: plugin.version,
    };

    try {
      if (plugin.init) {
        await withTimeout(plugin.init(context), INIT_TIMEOUT_MS, `Plugin "${plugin.name}" init()`);
      }
    } catch (error) {
      logger.error('Failed to initialize plugin', {
        name: plugin.name,
        error: errorMessage(error),
      });
      return false;
    }

    this.loaded.push({ plugin, context });

    logger.info('Plugin loaded successfully', {
      name: plugin.name,
      version: plugin.version,
    });
    return true;
  }

  /**
   * Offer a message to each plugin in order
   *
   * @returns The result of the plugin that stopped the chain, or 'not-handled'
   */
  async dispatch(message: ChatMessage): Promise<HandlerResult> {
    for (const { plugin, context } of this.loaded) {
      let result: HandlerResult;
      try {
        result = await plugin.handleMessage(message, context);
      } catch (error) {
        logger.error('Plugin threw while handling message', {
          name: plugin.name,
          chatId: message.chatId,
          error: errorMessage(error),
        });
        return 'handled-with-error';
      }

      if (result !== 'not-handled') {
        logger.debug('Message handled', { name: plugin.name, result });
        return result;
      }
    }

    return 'not-handled';
  }

  /**
   * Cleanup all loaded plugins on shutdown.
   * A misbehaving plugin does not stop the others from being destroyed.
   */
  async destroy(): Promise<void> {
    logger.debug('Cleaning up plugins', { count: this.loaded.length });

    for (const { plugin, context } of this.loaded) {
      if (!plugin.destroy) continue;

      try {
        await withTimeout(plugin.destroy(context), DESTROY_TIMEOUT_MS, `Plugin "${plugin.name}" destroy()`);
        logger.debug('Plugin destroyed', { name: plugin.name });
      } catch (error) {
        logger.error('Failed to destroy plugin', {
          name: plugin.name,
          error: errorMessage(error),
        });
      }
    }

    this.loaded = [];
  }

  /**
   * Loaded plugins as name@version, in dispatch order
   */
  getLoadedPlugins(): string[] {
    return this.loaded.map(({ plugin }) => `${plugin.name}@${plugin.version}`);
  }
}
