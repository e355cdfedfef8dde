import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import path from 'node:path';
import { StorageUnavailable } from '../core/errors';
import { logger } from '../observability/logger';
import { startOfLocalDay, type Role, type Turn, type TurnStats, type TurnStore } from './turn-store';

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS users (
  user_id    TEXT PRIMARY KEY,
  username   TEXT,
  first_seen INTEGER NOT NULL,
  last_seen  INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS messages (
  id         INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id    TEXT    NOT NULL REFERENCES users(user_id),
  role       TEXT    NOT NULL CHECK(role IN ('user', 'assistant')),
  content    TEXT    NOT NULL,
  created_at INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_messages_user_id ON messages(user_id, id);
CREATE INDEX IF NOT EXISTS idx_messages_created_at ON messages(created_at);
`;

type MessageRow = { user_id: string; role: Role; content: string; created_at: number };
type CountRow = { n: number };

type SqliteTurnStoreOpts = {
  /** File path, or ':memory:'. */
  dbPath: string;
  retainPerUser?: number;
  clock?: () => number;
};

export class SqliteTurnStore implements TurnStore {
  private db: Database.Database;
  private retainPerUser: number;
  private clock: () => number;

  constructor(opts: SqliteTurnStoreOpts) {
    if (opts.dbPath !== ':memory:') {
      mkdirSync(path.dirname(path.resolve(opts.dbPath)), { recursive: true });
    }
    this.db = new Database(opts.dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.exec(SCHEMA_SQL);
    this.retainPerUser = opts.retainPerUser ?? 0;
    this.clock = opts.clock ?? Date.now;
    logger.info('sqlite turn store ready', { path: opts.dbPath });
  }

  async append(userId: string, role: Role, content: string): Promise<Turn> {
    return this.guard('append', () => {
      const tx = this.db.transaction((): Turn => {
        const now = this.clock();
        this.upsertUser(userId, undefined, now);
        const last = this.db
          .prepare<[string], { created_at: number }>(
            'SELECT created_at FROM messages WHERE user_id = ? ORDER BY id DESC LIMIT 1'
          )
          .get(userId);
        const timestamp = Math.max(now, last?.created_at ?? 0);
        this.db
          .prepare<[string, Role, string, number]>(
            'INSERT INTO messages (user_id, role, content, created_at) VALUES (?, ?, ?, ?)'
          )
          .run(userId, role, content, timestamp);
        if (this.retainPerUser > 0) {
          this.db
            .prepare<[string, string, number]>(
              `DELETE FROM messages
               WHERE user_id = ? AND id NOT IN (
                 SELECT id FROM messages WHERE user_id = ? ORDER BY id DESC LIMIT ?
               )`
            )
            .run(userId, userId, this.retainPerUser);
        }
        return { userId, role, content, timestamp };
      });
      return tx();
    });
  }

  async recentTurns(userId: string, limit: number): Promise<Turn[]> {
    if (limit <= 0) return [];
    return this.guard('recentTurns', () => {
      const rows = this.db
        .prepare<[string, number], MessageRow>(
          `SELECT user_id, role, content, created_at FROM messages
           WHERE user_id = ? ORDER BY id DESC LIMIT ?`
        )
        .all(userId, limit);
      return rows.reverse().map((r) => ({
        userId: r.user_id,
        role: r.role,
        content: r.content,
        timestamp: r.created_at
      }));
    });
  }

  async resetHistory(userId: string): Promise<void> {
    this.guard('resetHistory', () => {
      this.db.prepare<[string]>('DELETE FROM messages WHERE user_id = ?').run(userId);
    });
  }

  async touchUser(userId: string, username?: string): Promise<void> {
    this.guard('touchUser', () => this.upsertUser(userId, username, this.clock()));
  }

  async listUserIds(): Promise<string[]> {
    return this.guard('listUserIds', () =>
      this.db
        .prepare<[], { user_id: string }>('SELECT user_id FROM users ORDER BY first_seen, user_id')
        .all()
        .map((r) => r.user_id)
    );
  }

  async stats(now = new Date()): Promise<TurnStats> {
    return this.guard('stats', () => {
      const count = (sql: string, ...params: number[]) =>
        this.db.prepare<number[], CountRow>(sql).get(...params)?.n ?? 0;
      return {
        totalUsers: count('SELECT COUNT(*) AS n FROM users'),
        totalMessages: count('SELECT COUNT(*) AS n FROM messages'),
        userMessages: count("SELECT COUNT(*) AS n FROM messages WHERE role = 'user'"),
        activeToday: count(
          'SELECT COUNT(DISTINCT user_id) AS n FROM messages WHERE created_at >= ?',
          startOfLocalDay(now)
        )
      };
    });
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
      logger.info('sqlite turn store closed');
    }
  }

  private upsertUser(userId: string, username: string | undefined, now: number) {
    this.db
      .prepare<[string, string | null, number, number]>(
        `INSERT INTO users (user_id, username, first_seen, last_seen) VALUES (?, ?, ?, ?)
         ON CONFLICT(user_id) DO UPDATE SET
           username  = COALESCE(excluded.username, users.username),
           last_seen = excluded.last_seen`
      )
      .run(userId, username ?? null, now, now);
  }

  private guard<T>(op: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      logger.error('sqlite turn store failure', { op, error: err });
      throw new StorageUnavailable(`turn store ${op} failed`, { cause: err });
    }
  }
}
