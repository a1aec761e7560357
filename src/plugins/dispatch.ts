import { matchCommand, normalizeContent, type CommandMatch } from '../core/command-matcher.js';
import type { AttachmentCache } from '../core/attachment-cache.js';
import type { CreditGate } from '../services/credit-gate.js';
import type { ProviderReply } from '../services/providers/types.js';
import type { BotClient, ChatMessage, HandlerResult } from '../host/types.js';
import { replyTo } from '../host/reply.js';
import { fetchImageAsBase64 } from '../utils/image.js';
import { InsufficientCreditError, errorMessage } from '../utils/errors.js';
import { truncateText } from '../formatters/scrub.js';
import { auditLog, logger } from '../utils/logger.js';

export const GENERIC_FAILURE_REPLY = '处理请求时出现错误，请稍后再试。';
export const MISSING_IMAGE_REPLY = '请先发送图片';

export function insufficientCreditReply(price: number): string {
  return `😭你的积分不够啦！需要 ${String(price)} 积分`;
}

/** Longest text sent in one message */
const MAX_REPLY_LENGTH = 4000;

/**
 * What a route hands the dispatch gate back
 */
export interface RouteReply extends ProviderReply {
  /** false when nothing useful was found and the user should not pay */
  charge?: boolean;
}

export interface RouteInvocation {
  message: ChatMessage;
  trigger: string;
  query: string;
  /** Inline or cached attachment, for attachment routes */
  attachment?: string;
  /** Send an interim message to the sender; a send failure is logged, not thrown */
  reply: (text: string) => Promise<void>;
  /** Send an interim message to the chat without mentioning anyone; never throws */
  notify: (text: string) => Promise<void>;
}

/**
 * One command a plugin answers
 */
export interface CommandRoute {
  name: string;
  /** Ordered triggers; first match wins */
  triggers: readonly string[];
  /** Consumes the chat's attachment instead of requiring a query */
  requiresAttachment?: boolean;
  /** Reply for an empty query. Without it an empty query is passed through. */
  usage?: string;
  /** Reply when an attachment route finds nothing to consume */
  missingAttachmentReply?: string;
  /** Reject query shapes this route does not understand; the route then does not match */
  accepts?: (query: string) => boolean;
  /** Skip credit checks, e.g. for help commands */
  free?: boolean;
  /**
   * Invoke the provider. Resolving counts as success and is charged
   * unless the reply says otherwise; null means nothing more to send.
   */
  run: (invocation: RouteInvocation) => Promise<RouteReply | null>;
}

export interface DispatchGateOptions {
  plugin: string;
  routes: CommandRoute[];
  credit: CreditGate;
  /** Required when any route consumes attachments */
  cache?: AttachmentCache;
}

interface RouteMatch {
  route: CommandRoute;
  match: CommandMatch;
}

/**
 * Orchestrates one plugin's handling of a message: attachment caching,
 * command matching, credit checks, provider invocation and the reply.
 */
export class DispatchGate {
  private plugin: string;
  private routes: CommandRoute[];
  private credit: CreditGate;
  private cache: AttachmentCache | undefined;

  constructor(options: DispatchGateOptions) {
    if (!options.cache && options.routes.some((r) => r.requiresAttachment)) {
      throw new Error(`Plugin "${options.plugin}" has attachment routes but no attachment cache`);
    }

    this.plugin = options.plugin;
    this.routes = options.routes;
    this.credit = options.credit;
    this.cache = options.cache;
  }

  async handle(message: ChatMessage, client: BotClient): Promise<HandlerResult> {
    const text = normalizeContent(message.content, message.isGroup);
    const matched = this.match(text);

    if (message.attachment) {
      if (!matched?.route.requiresAttachment) {
        if (this.cache) {
          this.cache.put(message.chatId, message.attachment.reference);
          logger.debug('Attachment cached', { plugin: this.plugin, chatId: message.chatId });
        }
        return 'not-handled';
      }

      // The inline attachment supersedes whatever was waiting for this chat
      this.cache?.take(message.chatId);
      return this.execute(matched, message, client, message.attachment.reference);
    }

    if (!matched) {
      return 'not-handled';
    }

    const { route, match } = matched;

    if (route.requiresAttachment) {
      const attachment = this.cache?.take(message.chatId);
      if (attachment === undefined) {
        await this.safeReply(client, message, route.missingAttachmentReply ?? MISSING_IMAGE_REPLY);
        return 'handled';
      }
      return this.execute(matched, message, client, attachment);
    }

    if (!match.query && route.usage !== undefined) {
      await this.safeReply(client, message, route.usage);
      return 'handled';
    }

    return this.execute(matched, message, client);
  }

  /**
   * First route, in order, whose triggers lead the text and that accepts the query
   */
  private match(text: string): RouteMatch | null {
    if (!text) return null;

    for (const route of this.routes) {
      const match = matchCommand(text, route.triggers);
      if (match && (!route.accepts || route.accepts(match.query))) {
        return { route, match };
      }
    }
    return null;
  }

  private async execute(
    { route, match }: RouteMatch,
    message: ChatMessage,
    client: BotClient,
    attachment?: string
  ): Promise<HandlerResult> {
    auditLog({
      plugin: this.plugin,
      route: route.name,
      chatId: message.chatId,
      senderId: message.senderId,
      trigger: match.trigger,
      query: match.query,
    });

    if (!route.free) {
      try {
        this.credit.ensure(message.senderId);
      } catch (error) {
        if (error instanceof InsufficientCreditError) {
          await this.safeReply(client, message, insufficientCreditReply(error.required));
          return 'handled';
        }
        throw error;
      }
    }

    let result: RouteReply | null;
    try {
      result = await route.run({
        message,
        trigger: match.trigger,
        query: match.query,
        attachment,
        reply: (text) => this.safeReply(client, message, text),
        notify: (text) => this.safeSend(() => client.sendText(message.chatId, text), message),
      });
    } catch (error) {
      logger.error('Command failed', {
        plugin: this.plugin,
        route: route.name,
        chatId: message.chatId,
        error: errorMessage(error),
      });
      await this.safeReply(client, message, GENERIC_FAILURE_REPLY);
      return 'handled-with-error';
    }

    let outcome: HandlerResult = 'handled';
    if (result) {
      try {
        await this.deliver(result, message, client);
      } catch (error) {
        logger.error('Failed to deliver reply', {
          plugin: this.plugin,
          route: route.name,
          chatId: message.chatId,
          error: errorMessage(error),
        });
        outcome = 'handled-with-error';
      }
    }

    if (!route.free && result?.charge !== false) {
      this.credit.charge(message.senderId);
    }

    return outcome;
  }

  private async deliver(reply: RouteReply, message: ChatMessage, client: BotClient): Promise<void> {
    if (reply.text) {
      await replyTo(client, message, truncateText(reply.text, MAX_REPLY_LENGTH));
    }

    for (const url of reply.imageUrls ?? []) {
      try {
        const image = await fetchImageAsBase64(url);
        await client.sendImage(message.chatId, image.data);
      } catch (error) {
        logger.warn('Failed to send image, falling back to link', {
          plugin: this.plugin,
          url,
          error: errorMessage(error),
        });
        await client.sendText(message.chatId, url);
      }
    }
  }

  /**
   * Reply; a send failure is logged, not propagated
   */
  private safeReply(client: BotClient, message: ChatMessage, text: string): Promise<void> {
    return this.safeSend(() => replyTo(client, message, text), message);
  }

  private async safeSend(send: () => Promise<void>, message: ChatMessage): Promise<void> {
    try {
      await send();
    } catch (error) {
      logger.error('Failed to send reply', {
        plugin: this.plugin,
        chatId: message.chatId,
        error: errorMessage(error),
      });
    }
  }
}
