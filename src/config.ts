export type Config = {
  telegramBotToken?: string;
  enableTelegram: boolean;
  enableHttp: boolean;
  httpHost: string;
  port: number;
  httpApiToken?: string;
  adminUserIds: string[];
  // LLM
  openaiApiKey?: string;
  openaiBaseUrl?: string;
  openaiModel: string;
  openaiTemperature: number;
  openaiMaxTokens: number;
  completionTimeoutMs: number;
  completionMaxRetries: number;
  completionBackoffMs: number;
  // Transcription
  transcribeModel: string;
  transcribeLanguage?: string;
  // Context window
  historyLimit: number;
  historyRetain: number; // 0 keeps every turn
  maxInputTokens: number;
  maxKnowledgeTokens: number;
  // Storage
  dbPath: string; // 'memory' selects the in-process store
  historyDir?: string;
  // Knowledge
  googleDriveFileId?: string;
  googleServiceAccountJson?: string;
  knowledgeFile?: string;
  knowledgeCachePath: string;
  knowledgeRefreshCron?: string;
  broadcastDelayMs: number;
};

type Env = Record<string, string | undefined>;

function flag(value: string | undefined, fallback: boolean): boolean {
  return String(value ?? String(fallback)).toLowerCase() === 'true';
}

function int(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const n = Number(value);
  return Number.isFinite(n) ? Math.trunc(n) : fallback;
}

function num(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const n = Number(value);
  return Number.isFinite(n) ? n : fallback;
}

function optional(value: string | undefined): string | undefined {
  const v = value?.trim();
  return v ? v : undefined;
}

export function parseAdminIds(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(',')
    .map((id) => id.trim())
    .filter((id) => /^\d+$/.test(id));
}

export function loadConfig(env: Env = process.env): Config {
  return {
    telegramBotToken: optional(env.TELEGRAM_BOT_TOKEN),
    enableTelegram: flag(env.ENABLE_TELEGRAM, true),
    enableHttp: flag(env.ENABLE_HTTP, false),
    httpHost: optional(env.HTTP_HOST) ?? '127.0.0.1',
    port: int(env.PORT, 3000),
    httpApiToken: optional(env.HTTP_API_TOKEN),
    adminUserIds: parseAdminIds(env.ADMIN_USER_IDS),
    openaiApiKey: optional(env.OPENAI_API_KEY),
    openaiBaseUrl: optional(env.OPENAI_BASE_URL),
    openaiModel: env.OPENAI_MODEL ?? 'gpt-4o-mini',
    openaiTemperature: num(env.OPENAI_TEMPERATURE, 0.7),
    openaiMaxTokens: int(env.OPENAI_MAX_TOKENS, 1000),
    completionTimeoutMs: int(env.COMPLETION_TIMEOUT_MS, 30000),
    completionMaxRetries: Math.max(0, int(env.COMPLETION_MAX_RETRIES, 2)),
    completionBackoffMs: Math.max(0, int(env.COMPLETION_BACKOFF_MS, 500)),
    transcribeModel: env.TRANSCRIBE_MODEL ?? 'whisper-1',
    transcribeLanguage: env.TRANSCRIBE_LANGUAGE === undefined ? 'ru' : optional(env.TRANSCRIBE_LANGUAGE),
    historyLimit: Math.max(0, int(env.HISTORY_LIMIT, 20)),
    historyRetain: Math.max(0, int(env.HISTORY_RETAIN, 0)),
    maxInputTokens: int(env.MAX_INPUT_TOKENS, 12000),
    maxKnowledgeTokens: int(env.MAX_KNOWLEDGE_TOKENS, 8000),
    dbPath: env.DB_PATH ?? 'data/assistant.db',
    historyDir: env.HISTORY_DIR === undefined ? 'history' : optional(env.HISTORY_DIR),
    googleDriveFileId: optional(env.GOOGLE_DRIVE_FILE_ID),
    googleServiceAccountJson: optional(env.GOOGLE_SERVICE_ACCOUNT_JSON),
    knowledgeFile: optional(env.KNOWLEDGE_FILE),
    knowledgeCachePath: env.KNOWLEDGE_CACHE_PATH ?? 'data/knowledge_base.md',
    knowledgeRefreshCron:
      env.KNOWLEDGE_REFRESH_CRON === undefined ? '0 */6 * * *' : optional(env.KNOWLEDGE_REFRESH_CRON),
    broadcastDelayMs: Math.max(0, int(env.BROADCAST_DELAY_MS, 50))
  };
}

/** Throws listing every secret the running process cannot start without. */
export function requireSecrets(cfg: Config): void {
  const missing: string[] = [];
  if (!cfg.openaiApiKey) missing.push('OPENAI_API_KEY');
  if (cfg.enableTelegram && !cfg.telegramBotToken) missing.push('TELEGRAM_BOT_TOKEN');
  if (cfg.enableHttp && !cfg.httpApiToken) missing.push('HTTP_API_TOKEN');
  if (!cfg.knowledgeFile && !cfg.googleDriveFileId) missing.push('GOOGLE_DRIVE_FILE_ID or KNOWLEDGE_FILE');
  if (cfg.googleDriveFileId && !cfg.knowledgeFile && !cfg.googleServiceAccountJson) {
    missing.push('GOOGLE_SERVICE_ACCOUNT_JSON');
  }
  if (missing.length > 0) {
    throw new Error(`missing required configuration: ${missing.join(', ')}`);
  }
}

// Centralized config with sensible defaults; all values can be overridden via env.
export const config: Config = loadConfig();
