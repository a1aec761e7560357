import { TtlCache } from './ttl-cache.js';

/**
 * Short-lived per-chat store of the last attachment a plugin received,
 * waiting for a follow-up command such as "分析图片".
 *
 * One instance per plugin; the key space is the chat id. At most one entry
 * per chat: a newer attachment replaces the older one, and take() removes
 * the entry it returns.
 */
export class AttachmentCache extends TtlCache<string> {}
