import type { BotClient, ChatMessage } from './types.js';

/**
 * Reply to the sender of a message.
 * In groups the reply mentions the sender and starts on a new line.
 */
export async function replyTo(client: BotClient, message: ChatMessage, text: string): Promise<void> {
  if (message.isGroup && message.senderId) {
    await client.sendAt(message.chatId, `\n${text}`, [message.senderId]);
    return;
  }

  await client.sendText(message.chatId, text);
}
