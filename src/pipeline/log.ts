/* Structured run logger: JSON lines (or coloured text), step timers with ETA */
import { performance } from 'perf_hooks';
import fs from 'fs';
import path from 'path';
import { ENV } from './env';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogMeta = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const COLORS: Record<LogLevel, string> = {
  debug: '\u001b[90m',
  info: '\u001b[36m',
  warn: '\u001b[33m',
  error: '\u001b[31m',
};
const RESET = '\u001b[0m';

export function isLogLevel(v: string | undefined): v is LogLevel {
  return v !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, v);
}

const envLevel = ENV.logLevel;
const minLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';
const lastProgress = new Map<string, number>();
let logFileFd: number | null = null;

export interface StepTimer {
  end: (extra?: LogMeta) => void;
  eta: (done: number, total: number) => void;
}

/** Mirrors every event, as JSON, into filePath (appending). */
export function setLogFile(filePath: string) {
  try {
    if (logFileFd !== null) {
      fs.closeSync(logFileFd);
      logFileFd = null;
    }
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    logFileFd = fs.openSync(filePath, 'a');
  } catch (e) {
    // eslint-disable-next-line no-console
    console.error('Failed to open log file', filePath, e);
  }
}

export function log(level: LogLevel, msg: string, meta?: LogMeta) {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
  const payload = { t: new Date().toISOString(), level, msg, ...meta };
  const json = JSON.stringify(payload);
  if (ENV.logFormat === 'pretty') {
    const metaStr = meta && Object.keys(meta).length ? ' ' + JSON.stringify(meta) : '';
    // eslint-disable-next-line no-console
    console.log(`${COLORS[level]}${payload.t} ${level.toUpperCase()} ${msg}${RESET}${metaStr}`);
  } else {
    // eslint-disable-next-line no-console
    console.log(json);
  }
  if (logFileFd !== null) fs.writeSync(logFileFd, json + '\n');
}

export function debug(msg: string, meta?: LogMeta) {
  log('debug', msg, meta);
}
export function info(msg: string, meta?: LogMeta) {
  log('info', msg, meta);
}
export function warn(msg: string, meta?: LogMeta) {
  log('warn', msg, meta);
}
export function error(msg: string, meta?: LogMeta) {
  log('error', msg, meta);
}

// Throttles progress events per step name
function progressDue(key: string): boolean {
  const now = performance.now();
  const last = lastProgress.get(key);
  if (last !== undefined && now - last < ENV.progressIntervalMs) return false;
  lastProgress.set(key, now);
  return true;
}

export function startStep(name: string, meta?: LogMeta): StepTimer {
  const start = performance.now();
  info(`start:${name}`, meta);
  return {
    end: (extra?: LogMeta) => {
      info(`end:${name}`, { ms: Math.round(performance.now() - start), ...meta, ...extra });
    },
    eta: (done: number, total: number) => {
      if (total <= 0 || !progressDue(name)) return;
      const elapsed = performance.now() - start;
      const remaining = done > 0 ? (elapsed / done) * (total - done) : 0;
      info(`progress:${name}`, {
        done,
        total,
        pct: Number(((done / total) * 100).toFixed(2)),
        etaMs: Math.round(remaining),
      });
    },
  };
}
