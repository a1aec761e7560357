import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { CreditLedger } from '../../src/services/credit-ledger.js';

vi.mock('../../src/utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const { CreditGate } = await import('../../src/services/credit-gate.js');
const { SqliteCreditLedger } = await import('../../src/services/credit-ledger.js');
const { InsufficientCreditError } = await import('../../src/utils/errors.js');
const { logger } = await import('../../src/utils/logger.js');

const policy = { price: 5, adminIgnore: true, whitelistIgnore: true };

describe('CreditGate', () => {
  let ledger: InstanceType<typeof SqliteCreditLedger>;

  beforeEach(() => {
    vi.clearAllMocks();
    ledger = new SqliteCreditLedger(':memory:');
  });

  afterEach(() => {
    ledger.close();
  });

  describe('ensure', () => {
    it('should pass when the balance covers the price', () => {
      ledger.addPoints('wxid_user', 5);
      const gate = new CreditGate('test', ledger, policy, []);

      expect(() => { gate.ensure('wxid_user'); }).not.toThrow();
    });

    it('should throw InsufficientCreditError below the price', () => {
      ledger.addPoints('wxid_user', 4);
      const gate = new CreditGate('test', ledger, policy, []);

      let caught: unknown;
      try {
        gate.ensure('wxid_user');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(InsufficientCreditError);
      expect(caught).toMatchObject({ required: 5, balance: 4 });
    });

    it('should skip admins when adminIgnore is set', () => {
      const gate = new CreditGate('test', ledger, policy, ['wxid_admin']);

      expect(() => { gate.ensure('wxid_admin'); }).not.toThrow();
    });

    it('should check admins when adminIgnore is off', () => {
      const gate = new CreditGate('test', ledger, { ...policy, adminIgnore: false }, ['wxid_admin']);

      expect(() => { gate.ensure('wxid_admin'); }).toThrow(InsufficientCreditError);
    });

    it('should skip whitelisted users when whitelistIgnore is set', () => {
      ledger.setWhitelisted('wxid_vip', true);
      const gate = new CreditGate('test', ledger, policy, []);

      expect(() => { gate.ensure('wxid_vip'); }).not.toThrow();
    });

    it('should check whitelisted users when whitelistIgnore is off', () => {
      ledger.setWhitelisted('wxid_vip', true);
      const gate = new CreditGate('test', ledger, { ...policy, whitelistIgnore: false }, []);

      expect(() => { gate.ensure('wxid_vip'); }).toThrow(InsufficientCreditError);
    });

    it('should allow everything when the price is zero', () => {
      const gate = new CreditGate('test', ledger, { ...policy, price: 0 }, []);

      expect(gate.isExempt('wxid_user')).toBe(true);
      expect(() => { gate.ensure('wxid_user'); }).not.toThrow();
    });

    it('should allow everything without a ledger', () => {
      const gate = new CreditGate('test', null, policy, []);

      expect(() => { gate.ensure('wxid_user'); }).not.toThrow();
    });

    it('should let the request through when the ledger fails', () => {
      const broken: CreditLedger = {
        getPoints: vi.fn(() => {
          throw new Error('database is locked');
        }),
        addPoints: vi.fn(),
        isWhitelisted: vi.fn(() => false),
      };
      const gate = new CreditGate('test', broken, policy, []);

      expect(() => { gate.ensure('wxid_user'); }).not.toThrow();
      expect(logger.error).toHaveBeenCalledWith(
        'Credit lookup failed, allowing request',
        expect.objectContaining({ error: 'database is locked' })
      );
    });
  });

  describe('charge', () => {
    it('should deduct the price', () => {
      ledger.addPoints('wxid_user', 12);
      const gate = new CreditGate('test', ledger, policy, []);

      gate.charge('wxid_user');

      expect(ledger.getPoints('wxid_user')).toBe(7);
    });

    it('should not charge exempt users', () => {
      ledger.addPoints('wxid_admin', 12);
      const gate = new CreditGate('test', ledger, policy, ['wxid_admin']);

      gate.charge('wxid_admin');

      expect(ledger.getPoints('wxid_admin')).toBe(12);
    });

    it('should log and swallow deduction failures', () => {
      const broken: CreditLedger = {
        getPoints: vi.fn(() => 100),
        addPoints: vi.fn(() => {
          throw new Error('disk full');
        }),
        isWhitelisted: vi.fn(() => false),
      };
      const gate = new CreditGate('test', broken, policy, []);

      expect(() => { gate.charge('wxid_user'); }).not.toThrow();
      expect(logger.error).toHaveBeenCalledWith(
        'Credit deduction failed',
        expect.objectContaining({ error: 'disk full' })
      );
    });
  });
});
