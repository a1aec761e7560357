import { requestJson } from '../http.js';
import { completionText } from './chat-completion.js';
import {
  toImageUrl,
  type ChatCompletionMessage,
  type ProviderConnection,
  type ProviderReply,
} from './types.js';

export interface FastGptRequest {
  question: string;
  /** Attachment reference for image questions */
  image?: string;
  /** FastGPT keeps conversation history per chatId */
  chatId?: string;
}

/**
 * FastGPT knowledge-base client (OpenAI-compatible completions endpoint)
 */
export class FastGptClient {
  readonly name = 'fastgpt';

  private connection: ProviderConnection;

  constructor(connection: ProviderConnection) {
    this.connection = connection;
  }

  async ask(request: FastGptRequest): Promise<ProviderReply> {
    const message: ChatCompletionMessage = request.image
      ? {
          role: 'user',
          content: [
            { type: 'text', text: request.question },
            { type: 'image_url', image_url: { url: toImageUrl(request.image) } },
          ],
        }
      : { role: 'user', content: request.question };

    const body = await requestJson({
      provider: this.name,
      url: `${this.connection.baseUrl}/v1/chat/completions`,
      method: 'POST',
      apiKey: this.connection.apiKey,
      timeoutMs: this.connection.timeoutMs,
      body: {
        ...(request.chatId ? { chatId: request.chatId } : {}),
        stream: false,
        detail: false,
        messages: [message],
      },
    });

    return { text: completionText(this.name, body) };
  }
}
