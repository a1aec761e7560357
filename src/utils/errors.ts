/**
 * Error types shared by the plugins
 *
 * All errors are local to one message: nothing here is persisted or carried
 * across messages.
 */

/**
 * A plugin's configuration section is missing or invalid.
 * The plugin is disabled at load time; the host keeps running.
 */
export class ConfigurationError extends Error {
  readonly section: string;
  readonly issues: string[];

  constructor(section: string, issues: string[]) {
    super(`Invalid configuration for "${section}":\n${issues.map((i) => `  - ${i}`).join('\n')}`);
    this.name = 'ConfigurationError';
    this.section = section;
    this.issues = issues;
  }
}

/**
 * An upstream API call failed: non-2xx status, network failure, timeout,
 * malformed JSON or a body that does not match the provider's schema.
 */
export class ProviderError extends Error {
  readonly provider: string;
  /** Upstream HTTP status, absent for network failures and timeouts */
  readonly status: number | undefined;
  readonly upstreamMessage: string;

  constructor(provider: string, upstreamMessage: string, status?: number) {
    const statusPart = status === undefined ? '' : ` (HTTP ${String(status)})`;
    super(`${provider} request failed${statusPart}: ${upstreamMessage}`);
    this.name = 'ProviderError';
    this.provider = provider;
    this.status = status;
    this.upstreamMessage = upstreamMessage;
  }
}

/**
 * The sender's balance is below the command's price
 */
export class InsufficientCreditError extends Error {
  readonly required: number;
  readonly balance: number;

  constructor(required: number, balance: number) {
    super(`Insufficient credit: required ${String(required)}, balance ${String(balance)}`);
    this.name = 'InsufficientCreditError';
    this.required = required;
    this.balance = balance;
  }
}

/**
 * Extract a loggable message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
