import { startOfLocalDay, type Role, type Turn, type TurnStats, type TurnStore } from './turn-store';

type MemoryTurnStoreOpts = {
  retainPerUser?: number;
  clock?: () => number;
};

type UserEntry = { username?: string; turns: Turn[] };

export class MemoryTurnStore implements TurnStore {
  private users = new Map<string, UserEntry>();
  private retainPerUser: number;
  private clock: () => number;

  constructor(opts: MemoryTurnStoreOpts = {}) {
    this.retainPerUser = opts.retainPerUser ?? 0;
    this.clock = opts.clock ?? Date.now;
  }

  async append(userId: string, role: Role, content: string): Promise<Turn> {
    const entry = this.entry(userId);
    const last = entry.turns[entry.turns.length - 1];
    const timestamp = Math.max(this.clock(), last?.timestamp ?? 0);
    const turn: Turn = Object.freeze({ userId, role, content, timestamp });
    entry.turns.push(turn);
    if (this.retainPerUser > 0 && entry.turns.length > this.retainPerUser) {
      entry.turns = entry.turns.slice(-this.retainPerUser);
    }
    return turn;
  }

  async recentTurns(userId: string, limit: number): Promise<Turn[]> {
    if (limit <= 0) return [];
    const turns = this.users.get(userId)?.turns ?? [];
    return turns.slice(-limit);
  }

  async resetHistory(userId: string): Promise<void> {
    const entry = this.users.get(userId);
    if (entry) entry.turns = [];
  }

  async touchUser(userId: string, username?: string): Promise<void> {
    const entry = this.entry(userId);
    if (username) entry.username = username;
  }

  async listUserIds(): Promise<string[]> {
    return [...this.users.keys()];
  }

  async stats(now = new Date()): Promise<TurnStats> {
    const since = startOfLocalDay(now);
    let totalMessages = 0;
    let userMessages = 0;
    let activeToday = 0;
    for (const { turns } of this.users.values()) {
      totalMessages += turns.length;
      userMessages += turns.filter((t) => t.role === 'user').length;
      if (turns.some((t) => t.timestamp >= since)) activeToday += 1;
    }
    return { totalUsers: this.users.size, totalMessages, userMessages, activeToday };
  }

  async close(): Promise<void> {}

  private entry(userId: string): UserEntry {
    let entry = this.users.get(userId);
    if (!entry) {
      entry = { turns: [] };
      this.users.set(userId, entry);
    }
    return entry;
  }
}
