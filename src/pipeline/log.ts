/* Lightweight structured logger with step timing & ETA */
import { performance } from 'perf_hooks';
import fs from 'fs';
import path from 'path';

interface InternalConfig {
  format: 'json' | 'pretty';
  progressIntervalMs: number;
}

export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogMeta = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function levelFromEnv(): LogLevel {
  const raw = (process.env.LOG_LEVEL || '').toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

let currentLevel: LogLevel = levelFromEnv();
const config: InternalConfig = {
  format: process.env.LOG_FORMAT === 'json' ? 'json' : 'pretty',
  progressIntervalMs: Number(process.env.PROGRESS_INTERVAL_MS || 1500),
};
export function setLogLevel(l: LogLevel) {
  currentLevel = l;
}
export function getLogLevel(): LogLevel {
  return currentLevel;
}

function ts() { return new Date().toISOString(); }

export interface StepTimer {
  end: () => void;
  eta: (done: number, total: number) => void;
}

function color(level: LogLevel, s: string) {
  if (config.format !== 'pretty') return s;
  const map: Record<LogLevel, string> = {
    debug: '\u001b[90m',
    info: '\u001b[36m',
    warn: '\u001b[33m',
    error: '\u001b[31m',
  };
  const reset = '\u001b[0m';
  return map[level] + s + reset;
}

const lastProgress: Record<string, number> = {};
let logFileFd: number | null = null;

export function setLogFile(filePath: string) {
  if (logFileFd !== null) {
    fs.closeSync(logFileFd);
    logFileFd = null;
  }
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  logFileFd = fs.openSync(filePath, 'a');
}

export function closeLogFile() {
  if (logFileFd === null) return;
  fs.closeSync(logFileFd);
  logFileFd = null;
}

export function log(level: LogLevel, msg: string, meta?: LogMeta) {
  // The log file receives every line regardless of the console level
  const payload = { t: ts(), level, msg, ...(meta || {}) };
  if (logFileFd !== null) {
    fs.writeSync(logFileFd, JSON.stringify(payload) + '\n');
  }
  if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;
  // eslint-disable-next-line no-console
  const write = level === 'error' || level === 'warn' ? console.error : console.log;
  if (config.format === 'json') {
    write(JSON.stringify(payload));
  } else {
    const base = `${payload.t} ${level.toUpperCase()} ${msg}`;
    const metaStr = meta && Object.keys(meta).length ? ' ' + JSON.stringify(meta) : '';
    write(color(level, base) + metaStr);
  }
}

export function shouldEmitProgress(key: string) {
  const now = performance.now();
  const last = lastProgress[key] || 0;
  if (now - last < config.progressIntervalMs) return false;
  lastProgress[key] = now;
  return true;
}

export function debug(msg: string, meta?: LogMeta) {
  log("debug", msg, meta);
}
export function info(msg: string, meta?: LogMeta) {
  log("info", msg, meta);
}
export function warn(msg: string, meta?: LogMeta) {
  log("warn", msg, meta);
}
export function error(msg: string, meta?: LogMeta) {
  log("error", msg, meta);
}

export function startStep(name: string, meta?: LogMeta): StepTimer {
  const start = performance.now();
  info(`start:${name}`, meta);
  return {
    end: () => {
      const durMs = performance.now() - start;
      info(`end:${name}`, { ms: Math.round(durMs), ...meta });
    },
    eta: (done: number, total: number) => {
      if (total <= 0) return;
      const elapsed = performance.now() - start;
      const rate = done > 0 ? elapsed / done : 0;
      const remaining = done > 0 ? rate * (total - done) : 0;
      if (shouldEmitProgress(name) || done === total) {
        info(`progress:${name}`, {
          done,
          total,
          pct: Number(((done / total) * 100).toFixed(2)),
          etaMs: Math.round(remaining),
        });
      }
    },
  };
}
