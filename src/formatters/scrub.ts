/**
 * Scrubbing for upstream error bodies
 *
 * Provider error responses sometimes echo the request, including the bearer
 * token. Everything that ends up in a log line or a ProviderError message
 * goes through scrubSensitiveData first.
 */

const SENSITIVE_PATTERNS: { pattern: RegExp; replacement: string }[] = [
  // API keys and tokens
  { pattern: /api[_-]?key[=:]\s*["']?([^"'\s]+)["']?/gi, replacement: 'api_key=[REDACTED]' },
  { pattern: /apikey[=:]\s*["']?([^"'\s]+)["']?/gi, replacement: 'apikey=[REDACTED]' },
  { pattern: /access[_-]?token[=:]\s*["']?([^"'\s]+)["']?/gi, replacement: 'access_token=[REDACTED]' },
  { pattern: /token[=:]\s*["']?([^"'\s]+)["']?/gi, replacement: 'token=[REDACTED]' },
  { pattern: /secret[=:]\s*["']?([^"'\s]+)["']?/gi, replacement: 'secret=[REDACTED]' },

  // Authorization headers
  { pattern: /authorization:\s*bearer\s+\S+/gi, replacement: 'Authorization: Bearer [REDACTED]' },
  { pattern: /\bbearer\s+[A-Za-z0-9._-]{8,}/gi, replacement: 'Bearer [REDACTED]' },

  // Provider key formats (OpenAI-compatible sk-..., FastGPT fastgpt-..., Dify app-...)
  { pattern: /\b(sk|fastgpt|app)-[A-Za-z0-9_-]{8,}/g, replacement: '$1-[REDACTED]' },

  // Credentials embedded in URLs
  { pattern: /(https?):\/\/[^:/\s]+:([^@\s]+)@/gi, replacement: '$1://[USER]:[REDACTED]@' },
];

/**
 * Scrub sensitive data from text
 */
export function scrubSensitiveData(text: string): string {
  let scrubbed = text;

  for (const { pattern, replacement } of SENSITIVE_PATTERNS) {
    scrubbed = scrubbed.replace(pattern, replacement);
  }

  return scrubbed;
}

/**
 * Truncate text to a maximum number of characters, adding a marker if truncated.
 * Counts code points so CJK text and emoji are never split.
 */
export function truncateText(text: string, maxLength = 2000): string {
  const chars = Array.from(text);
  if (chars.length <= maxLength) {
    return text;
  }

  return chars.slice(0, maxLength).join('') + '\n... [truncated]';
}
