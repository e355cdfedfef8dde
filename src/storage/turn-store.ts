export type Role = 'user' | 'assistant';

export interface Turn {
  userId: string;
  role: Role;
  content: string;
  timestamp: number;
}

export interface TurnStats {
  totalUsers: number;
  totalMessages: number;
  userMessages: number;
  activeToday: number;
}

/**
 * Append-only per-user conversation log. Implementations fail writes with
 * StorageUnavailable and never fail a read for an unknown user.
 */
export interface TurnStore {
  append(userId: string, role: Role, content: string): Promise<Turn>;
  /** Up to `limit` most recent turns, oldest first. */
  recentTurns(userId: string, limit: number): Promise<Turn[]>;
  resetHistory(userId: string): Promise<void>;
  touchUser(userId: string, username?: string): Promise<void>;
  listUserIds(): Promise<string[]>;
  stats(now?: Date): Promise<TurnStats>;
  close(): Promise<void>;
}

export function startOfLocalDay(now: Date): number {
  const d = new Date(now);
  d.setHours(0, 0, 0, 0);
  return d.getTime();
}
