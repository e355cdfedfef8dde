import fs from 'node:fs/promises';
import path from 'node:path';
import { logger, errorMessage } from '../observability/logger';

function pad(num: number) {
  return num.toString().padStart(2, '0');
}

function stamp(d: Date) {
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}, ${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

// Usernames end up in file names.
function safeName(value: string) {
  return value.replace(/[^\p{L}\p{N}_.-]+/gu, '_');
}

/**
 * Plain-text log of what each customer wrote, one file per user, one line per
 * message. Kept for the shop owner; the assistant never reads it back.
 */
export class HistoryJournal {
  constructor(
    private readonly baseDir: string,
    private readonly clock: () => Date = () => new Date()
  ) {}

  fileFor(userId: string, username?: string): string {
    const base = username ? `${safeName(username)} - ${safeName(userId)}` : safeName(userId);
    return path.join(this.baseDir, `${base}.txt`);
  }

  async record(userId: string, text: string, username?: string): Promise<void> {
    const line = `${stamp(this.clock())}, ${text.replace(/[\r\n]+/g, ' ')}\n`;
    try {
      await fs.mkdir(this.baseDir, { recursive: true });
      await fs.appendFile(this.fileFor(userId, username), line, 'utf8');
    } catch (err) {
      logger.warn('history journal write failed', { userId, error: errorMessage(err) });
    }
  }
}
