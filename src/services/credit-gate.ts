import type { CreditLedger } from './credit-ledger.js';
import { InsufficientCreditError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface CreditPolicy {
  price: number;
  adminIgnore: boolean;
  whitelistIgnore: boolean;
}

/**
 * Per-plugin credit check and deduction.
 *
 * The check happens before the provider call and the deduction only after
 * it succeeded, so a failed call never costs the user anything.
 */
export class CreditGate {
  private ledger: CreditLedger | null;
  private policy: CreditPolicy;
  private admins: ReadonlySet<string>;
  private pluginName: string;

  constructor(pluginName: string, ledger: CreditLedger | null, policy: CreditPolicy, admins: readonly string[]) {
    this.pluginName = pluginName;
    this.ledger = ledger;
    this.policy = policy;
    this.admins = new Set(admins);
  }

  /**
   * Whether this sender is never charged
   */
  isExempt(senderId: string): boolean {
    if (this.policy.price <= 0 || !this.ledger) {
      return true;
    }

    if (this.policy.adminIgnore && this.admins.has(senderId)) {
      return true;
    }

    if (this.policy.whitelistIgnore) {
      try {
        if (this.ledger.isWhitelisted(senderId)) {
          return true;
        }
      } catch (error) {
        logger.error('Whitelist lookup failed', {
          plugin: this.pluginName,
          senderId,
          error: errorMessage(error),
        });
      }
    }

    return false;
  }

  /**
   * Verify the sender can pay for one invocation.
   * A ledger failure lets the request through.
   *
   * @throws InsufficientCreditError when the balance is below the price
   */
  ensure(senderId: string): void {
    if (!this.ledger || this.isExempt(senderId)) {
      return;
    }

    let balance: number;
    try {
      balance = this.ledger.getPoints(senderId);
    } catch (error) {
      logger.error('Credit lookup failed, allowing request', {
        plugin: this.pluginName,
        senderId,
        error: errorMessage(error),
      });
      return;
    }

    if (balance < this.policy.price) {
      logger.info('Insufficient credit', {
        plugin: this.pluginName,
        senderId,
        balance,
        price: this.policy.price,
      });
      throw new InsufficientCreditError(this.policy.price, balance);
    }
  }

  /**
   * Deduct the price after a successful invocation
   */
  charge(senderId: string): void {
    if (!this.ledger || this.isExempt(senderId)) {
      return;
    }

    try {
      this.ledger.addPoints(senderId, -this.policy.price);
      logger.debug('Credit charged', {
        plugin: this.pluginName,
        senderId,
        price: this.policy.price,
      });
    } catch (error) {
      logger.error('Credit deduction failed', {
        plugin: this.pluginName,
        senderId,
        error: errorMessage(error),
      });
    }
  }
}
