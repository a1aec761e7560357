import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { logger } from '../utils/logger.js';

/**
 * Per-user credit balance, owned by the host's database.
 * Hosts with their own database implement this interface; the SQLite ledger
 * below is used otherwise.
 */
export interface CreditLedger {
  getPoints(wxid: string): number;
  /** Add (or, with a negative amount, deduct) points */
  addPoints(wxid: string, amount: number): void;
  isWhitelisted(wxid: string): boolean;
}

/**
 * SQLite-backed credit ledger
 */
export class SqliteCreditLedger implements CreditLedger {
  private db: Database.Database;

  /**
   * @param dbPath - Database file, or ":memory:"
   */
  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.initSchema();
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS credit_balances (
        wxid TEXT PRIMARY KEY,
        points INTEGER NOT NULL DEFAULT 0,
        updated_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS credit_whitelist (
        wxid TEXT PRIMARY KEY,
        added_at INTEGER NOT NULL
      );
    `);

    logger.debug('Credit ledger schema initialized');
  }

  getPoints(wxid: string): number {
    const row = this.db
      .prepare('SELECT points FROM credit_balances WHERE wxid = ?')
      .get(wxid) as { points: number } | undefined;

    return row?.points ?? 0;
  }

  addPoints(wxid: string, amount: number): void {
    this.db
      .prepare(`
        INSERT INTO credit_balances (wxid, points, updated_at)
        VALUES (?, ?, ?)
        ON CONFLICT(wxid) DO UPDATE SET
          points = points + excluded.points,
          updated_at = excluded.updated_at
      `)
      .run(wxid, amount, Date.now());
  }

  isWhitelisted(wxid: string): boolean {
    const row = this.db
      .prepare('SELECT 1 AS present FROM credit_whitelist WHERE wxid = ?')
      .get(wxid) as { present: number } | undefined;

    return row !== undefined;
  }

  setWhitelisted(wxid: string, whitelisted: boolean): void {
    if (whitelisted) {
      this.db
        .prepare('INSERT OR IGNORE INTO credit_whitelist (wxid, added_at) VALUES (?, ?)')
        .run(wxid, Date.now());
    } else {
      this.db.prepare('DELETE FROM credit_whitelist WHERE wxid = ?').run(wxid);
    }
  }

  close(): void {
    this.db.close();
    logger.debug('Credit ledger closed');
  }
}
