/**
 * Host interfaces
 *
 * The WeChat host owns message transport and delivers parsed message events.
 * A host bridge implements BotClient and feeds ChatMessage values into the
 * plugin chain.
 */

/**
 * An image or file the host received with a message.
 * `reference` is a URL, a data: URI or bare base64 content.
 */
export interface Attachment {
  kind: 'image' | 'file';
  reference: string;
}

/**
 * A parsed incoming message
 */
export interface ChatMessage {
  /** Conversation id: a group id (…@chatroom) or the peer's wxid */
  chatId: string;
  /** Sender wxid; equals chatId in private chats */
  senderId: string;
  /** Text content; empty for attachment-only messages */
  content: string;
  isGroup: boolean;
  attachment?: Attachment;
}

/**
 * Outbound messaging API provided by the host
 */
export interface BotClient {
  sendText(chatId: string, text: string): Promise<void>;
  /** Send text in a group, mentioning the given wxids */
  sendAt(chatId: string, text: string, atWxids: string[]): Promise<void>;
  /** Send an image given as base64 content */
  sendImage(chatId: string, base64: string): Promise<void>;
}

/**
 * What a plugin did with a message.
 * `not-handled` lets the host try the next plugin; the other two stop the chain.
 */
export type HandlerResult = 'handled' | 'not-handled' | 'handled-with-error';
