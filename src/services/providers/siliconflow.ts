import { z } from 'zod';
import { requestJson } from '../http.js';
import { completionText } from './chat-completion.js';
import { ProviderError } from '../../utils/errors.js';
import {
  parseProviderResponse,
  toImageUrl,
  type ChatCompletionMessage,
  type ProviderConnection,
  type ProviderReply,
} from './types.js';

export interface SiliconFlowModels {
  chat: string;
  vision: string;
  image: string;
  maxTokens: number;
  temperature: number;
  imageSize: string;
}

const ImageGenerationResponseSchema = z.object({
  images: z.array(z.object({ url: z.string().url() })),
  seed: z.number().optional(),
});

/**
 * SiliconFlow client: chat completions, vision and image generation
 */
export class SiliconFlowClient {
  readonly name = 'siliconflow';

  private connection: ProviderConnection;
  private models: SiliconFlowModels;

  constructor(connection: ProviderConnection, models: SiliconFlowModels) {
    this.connection = connection;
    this.models = models;
  }

  /**
   * Plain chat completion with the chat model
   */
  async chat(question: string): Promise<ProviderReply> {
    return this.complete(this.models.chat, [{ role: 'user', content: question }]);
  }

  /**
   * Ask the vision model about an image
   */
  async describeImage(image: string, question: string): Promise<ProviderReply> {
    return this.complete(this.models.vision, [
      {
        role: 'user',
        content: [
          { type: 'image_url', image_url: { url: toImageUrl(image) } },
          { type: 'text', text: question },
        ],
      },
    ]);
  }

  /**
   * Text-to-image generation
   */
  async generateImage(prompt: string): Promise<ProviderReply> {
    const body = await requestJson({
      provider: this.name,
      url: `${this.connection.baseUrl}/images/generations`,
      method: 'POST',
      apiKey: this.connection.apiKey,
      timeoutMs: this.connection.timeoutMs,
      body: {
        model: this.models.image,
        prompt,
        image_size: this.models.imageSize,
        batch_size: 1,
      },
    });

    const parsed = parseProviderResponse(this.name, ImageGenerationResponseSchema, body);
    if (parsed.images.length === 0) {
      throw new ProviderError(this.name, 'No images generated');
    }

    return {
      text: `🎨 ${prompt}`,
      imageUrls: parsed.images.map((image) => image.url),
    };
  }

  private async complete(model: string, messages: ChatCompletionMessage[]): Promise<ProviderReply> {
    const body = await requestJson({
      provider: this.name,
      url: `${this.connection.baseUrl}/chat/completions`,
      method: 'POST',
      apiKey: this.connection.apiKey,
      timeoutMs: this.connection.timeoutMs,
      body: {
        model,
        messages,
        stream: false,
        max_tokens: this.models.maxTokens,
        temperature: this.models.temperature,
      },
    });

    return { text: completionText(this.name, body) };
  }
}
