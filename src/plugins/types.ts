import type { BotClient, ChatMessage, HandlerResult } from '../host/types.js';
import type { CreditLedger } from '../services/credit-ledger.js';

/**
 * Context handed to plugins by the chain
 */
export interface PluginContext {
  /** Host messaging API */
  client: BotClient;
  /** Plugin's unique name */
  name: string;
  /** Plugin's version string */
  version: string;
}

/**
 * Shared services a plugin factory receives
 */
export interface PluginDeps {
  /** Host credit ledger; null disables billing */
  ledger: CreditLedger | null;
  /** Host admin wxids */
  admins: readonly string[];
  /** Per-request timeout for provider calls */
  timeoutMs: number;
}

/**
 * A chat plugin
 *
 * The chain calls handleMessage for every incoming message, in registration
 * order, until a plugin returns 'handled' or 'handled-with-error'.
 */
export interface Plugin {
  /** Unique identifier */
  name: string;

  /** Semver version string */
  version: string;

  description?: string;

  /**
   * Async initialization hook.
   * TIMEOUT: must complete within 10 seconds or the plugin is skipped.
   */
  init?: (ctx: PluginContext) => Promise<void>;

  handleMessage: (message: ChatMessage, ctx: PluginContext) => Promise<HandlerResult>;

  /**
   * Cleanup hook called on shutdown.
   * TIMEOUT: must complete within 5 seconds.
   */
  destroy?: (ctx: PluginContext) => Promise<void>;
}

/**
 * Type guard to validate plugin structure at runtime
 */
export function isValidPlugin(obj: unknown): obj is Plugin {
  if (typeof obj !== 'object' || obj === null) {
    return false;
  }

  const plugin = obj as Record<string, unknown>;

  if (typeof plugin.name !== 'string' || plugin.name.trim() === '') {
    return false;
  }

  if (typeof plugin.version !== 'string' || plugin.version.trim() === '') {
    return false;
  }

  if (typeof plugin.handleMessage !== 'function') {
    return false;
  }

  if (plugin.description !== undefined && typeof plugin.description !== 'string') {
    return false;
  }

  if (plugin.init !== undefined && typeof plugin.init !== 'function') {
    return false;
  }

  if (plugin.destroy !== undefined && typeof plugin.destroy !== 'function') {
    return false;
  }

  return true;
}
