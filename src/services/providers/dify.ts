import { z } from 'zod';
import { requestJson } from '../http.js';
import { ProviderError } from '../../utils/errors.js';
import { parseProviderResponse, type ProviderConnection, type ProviderReply } from './types.js';

const ChatMessageResponseSchema = z.object({
  answer: z.string(),
  conversation_id: z.string().optional(),
  message_id: z.string().optional(),
});

/**
 * Dify chat app client, blocking response mode
 */
export class DifyClient {
  readonly name = 'dify';

  private connection: ProviderConnection;

  constructor(connection: ProviderConnection) {
    this.connection = connection;
  }

  /**
   * @param user - Dify end-user identifier
   */
  async ask(query: string, user: string): Promise<ProviderReply> {
    const body = await requestJson({
      provider: this.name,
      url: `${this.connection.baseUrl}/chat-messages`,
      method: 'POST',
      apiKey: this.connection.apiKey,
      timeoutMs: this.connection.timeoutMs,
      body: {
        inputs: {},
        query,
        response_mode: 'blocking',
        user,
      },
    });

    const parsed = parseProviderResponse(this.name, ChatMessageResponseSchema, body);
    const answer = parsed.answer.trim();
    if (!answer) {
      throw new ProviderError(this.name, 'Empty answer');
    }

    return { text: answer };
  }
}
