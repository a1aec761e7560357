import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, existsSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

vi.mock('../../src/utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const { SqliteCreditLedger } = await import('../../src/services/credit-ledger.js');

describe('SqliteCreditLedger', () => {
  let ledger: InstanceType<typeof SqliteCreditLedger>;

  beforeEach(() => {
    ledger = new SqliteCreditLedger(':memory:');
  });

  afterEach(() => {
    ledger.close();
  });

  it('should report zero for unknown users', () => {
    expect(ledger.getPoints('wxid_new')).toBe(0);
  });

  it('should add and deduct points', () => {
    ledger.addPoints('wxid_user', 10);
    ledger.addPoints('wxid_user', -3);

    expect(ledger.getPoints('wxid_user')).toBe(7);
  });

  it('should keep balances per user', () => {
    ledger.addPoints('wxid_a', 5);
    ledger.addPoints('wxid_b', 2);

    expect(ledger.getPoints('wxid_a')).toBe(5);
    expect(ledger.getPoints('wxid_b')).toBe(2);
  });

  it('should manage the whitelist', () => {
    expect(ledger.isWhitelisted('wxid_vip')).toBe(false);

    ledger.setWhitelisted('wxid_vip', true);
    ledger.setWhitelisted('wxid_vip', true);
    expect(ledger.isWhitelisted('wxid_vip')).toBe(true);

    ledger.setWhitelisted('wxid_vip', false);
    expect(ledger.isWhitelisted('wxid_vip')).toBe(false);
  });
});

describe('SqliteCreditLedger on disk', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'credit-ledger-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should create the parent directory and persist balances', () => {
    const dbPath = join(dir, 'nested', 'credits.db');

    const first = new SqliteCreditLedger(dbPath);
    first.addPoints('wxid_user', 4);
    first.close();

    expect(existsSync(dbPath)).toBe(true);

    const second = new SqliteCreditLedger(dbPath);
    expect(second.getPoints('wxid_user')).toBe(4);
    second.close();
  });
});
