import type { z } from 'zod';
import { ProviderError } from '../../utils/errors.js';

/**
 * Plugin-neutral reply mapped from a provider response
 */
export interface ProviderReply {
  text: string;
  /** Images to send after the text, e.g. generated pictures */
  imageUrls?: string[];
}

/**
 * Settings shared by every HTTP provider
 */
export interface ProviderConnection {
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
}

/**
 * A chat message in OpenAI-compatible request bodies
 */
export type ChatContentPart =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string } };

export interface ChatCompletionMessage {
  role: 'system' | 'user' | 'assistant';
  content: string | ChatContentPart[];
}

/**
 * Validate a provider's JSON body against the expected schema
 *
 * @throws ProviderError when the body does not match
 */
export function parseProviderResponse<T>(
  provider: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  body: unknown
): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    const detail = result.error.errors
      .slice(0, 3)
      .map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`)
      .join('; ');
    throw new ProviderError(provider, `Unexpected response shape: ${detail}`);
  }
  return result.data;
}

/**
 * Normalise an attachment reference into a URL the vision APIs accept.
 * URLs and data: URIs pass through; bare base64 becomes a JPEG data URI.
 */
export function toImageUrl(reference: string): string {
  const trimmed = reference.trim();
  if (/^(https?:|data:)/i.test(trimmed)) {
    return trimmed;
  }
  return `data:image/jpeg;base64,${trimmed}`;
}
