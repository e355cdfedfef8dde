import { appendFileSync, existsSync, mkdirSync, renameSync, rmSync, statSync } from 'fs';
import { dirname } from 'path';

export type LogFields = Record<string, unknown>;

type Level = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const env = process.env;
const quiet = env.NODE_ENV === 'test';
const sinks = {
  console: !quiet && env.LOG_CONSOLE !== '0',
  file: !quiet && env.LOG_TO_FILE !== '0',
  debug: env.LOG_DEBUG === '1'
};
const logFile = env.LOG_FILE ?? 'logs/assistant.log';
const rotation = { maxBytes: 5 * 1024 * 1024, backups: 3, checkEvery: 64 * 1024 };
let fileReady = false;
let bytesSinceCheck = 0;

const LEVEL_COLOR: Record<Level, string> = {
  DEBUG: '\x1b[95m', // bright magenta
  INFO: '\x1b[34m', // blue
  WARN: '\x1b[33m', // yellow
  ERROR: '\x1b[31m' // red
};

function pad(num: number, size = 2) {
  return num.toString().padStart(size, '0');
}

function localTs(d = new Date()) {
  const date = `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
  const time = `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}.${pad(d.getMilliseconds(), 3)}`;
  return `${date} ${time}`;
}

function renderValue(value: unknown): string {
  if (value instanceof Error) return JSON.stringify(`${value.name}: ${value.message}`);
  if (typeof value === 'string') return /[\s="]/.test(value) || value === '' ? JSON.stringify(value) : value;
  if (value === undefined) return 'undefined';
  try {
    return JSON.stringify(value, (_key, v: unknown) => (v instanceof Error ? `${v.name}: ${v.message}` : v));
  } catch {
    return String(value);
  }
}

/** `msg key=value key="quoted value"`; undefined fields are left out. */
export function formatLine(msg: string, fields?: LogFields): string {
  if (!fields) return msg;
  const pairs = Object.entries(fields)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${renderValue(v)}`);
  return pairs.length > 0 ? `${msg} ${pairs.join(' ')}` : msg;
}

// logFile -> logFile.1 -> ... -> logFile.<backups>, checked every `checkEvery` bytes written.
function rotateIfNeeded(incoming: number) {
  bytesSinceCheck += incoming;
  if (bytesSinceCheck < rotation.checkEvery) return;
  bytesSinceCheck = 0;
  if (!existsSync(logFile) || statSync(logFile).size < rotation.maxBytes) return;
  const oldest = `${logFile}.${rotation.backups}`;
  if (existsSync(oldest)) rmSync(oldest);
  for (let i = rotation.backups - 1; i >= 1; i -= 1) {
    if (existsSync(`${logFile}.${i}`)) renameSync(`${logFile}.${i}`, `${logFile}.${i + 1}`);
  }
  renameSync(logFile, `${logFile}.1`);
}

function toFile(ts: string, level: Level, line: string) {
  if (!fileReady) {
    mkdirSync(dirname(logFile), { recursive: true });
    fileReady = true;
  }
  const entry = `[${ts}] [${level}] ${line}\n`;
  rotateIfNeeded(Buffer.byteLength(entry));
  appendFileSync(logFile, entry, 'utf8');
}

function emit(level: Level, msg: string, fields?: LogFields) {
  if (level === 'DEBUG' && !sinks.debug) return;
  if (!sinks.console && !sinks.file) return;
  const ts = localTs();
  const line = formatLine(msg, fields);
  if (sinks.console) {
    const tag = `${LEVEL_COLOR[level]}[${level}]\x1b[0m`;
    const write = level === 'ERROR' ? console.error : level === 'WARN' ? console.warn : console.log;
    write(`[${ts}] ${tag} ${line}`);
  }
  if (sinks.file) toFile(ts, level, line);
}

export const logger = {
  debug: (msg: string, fields?: LogFields) => emit('DEBUG', msg, fields),
  info: (msg: string, fields?: LogFields) => emit('INFO', msg, fields),
  warn: (msg: string, fields?: LogFields) => emit('WARN', msg, fields),
  error: (msg: string, fields?: LogFields) => emit('ERROR', msg, fields)
};

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
