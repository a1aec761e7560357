import { z } from 'zod';
import { ProviderError } from '../../utils/errors.js';
import { parseProviderResponse } from './types.js';

/**
 * OpenAI-compatible chat completion response, as returned by FastGPT and
 * SiliconFlow. Content may be a string or a list of text parts.
 */
const CompletionContentSchema = z.union([
  z.string(),
  z.array(z.object({ type: z.string(), text: z.string().optional() }).passthrough()),
  z.null(),
]);

export const ChatCompletionResponseSchema = z.object({
  id: z.string().optional(),
  model: z.string().optional(),
  choices: z.array(
    z.object({
      index: z.number().optional(),
      message: z.object({
        role: z.string().optional(),
        content: CompletionContentSchema.optional(),
      }),
      finish_reason: z.string().nullable().optional(),
    })
  ),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
      total_tokens: z.number().optional(),
    })
    .optional(),
});

/**
 * Extract the first choice's text from a chat completion body
 *
 * @throws ProviderError when the body is malformed or the answer is empty
 */
export function completionText(provider: string, body: unknown): string {
  const parsed = parseProviderResponse(provider, ChatCompletionResponseSchema, body);
  const content = parsed.choices[0]?.message.content;

  let text = '';
  if (typeof content === 'string') {
    text = content;
  } else if (Array.isArray(content)) {
    text = content.map((part) => part.text ?? '').join('');
  }

  text = text.trim();
  if (!text) {
    throw new ProviderError(provider, 'Empty completion');
  }
  return text;
}
