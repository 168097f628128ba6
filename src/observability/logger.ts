import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';

const consoleEnabled = process.env.NODE_ENV === 'test' ? false : process.env.DEBUG_TTS !== '0';
const fileEnabled = process.env.NODE_ENV === 'test' ? false : process.env.LOG_TO_FILE !== '0';
const logFile = process.env.LOG_FILE ?? 'logs/tts.log';
let fileReady = false;

type Level = 'INFO' | 'WARN' | 'ERROR' | 'DEBUG';

const levelOrder: Record<Level, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40
};

function resolveMinLevel(): number {
  const raw = (process.env.LOG_LEVEL ?? 'debug').toUpperCase();
  switch (raw) {
    case 'DEBUG':
    case 'INFO':
    case 'WARN':
    case 'ERROR':
      return levelOrder[raw];
    default:
      return levelOrder.DEBUG;
  }
}

const minLevel = resolveMinLevel();

function pad(num: number, size = 2) {
  return num.toString().padStart(size, '0');
}

function localTs() {
  const d = new Date();
  const yyyy = d.getFullYear();
  const MM = pad(d.getMonth() + 1);
  const dd = pad(d.getDate());
  const HH = pad(d.getHours());
  const mm = pad(d.getMinutes());
  const ss = pad(d.getSeconds());
  const ms = pad(d.getMilliseconds(), 3);
  return `${yyyy}-${MM}-${dd} ${HH}:${mm}:${ss}.${ms}`;
}

function color(level: Level) {
  const reset = '\x1b[0m';
  const colors: Record<Level, string> = {
    INFO: '\x1b[34m', // blue
    DEBUG: '\x1b[95m', // bright magenta
    WARN: '\x1b[33m', // yellow
    ERROR: '\x1b[31m' // red
  };
  return `${colors[level]}[${level}]${reset}`;
}

// Masks credentials that end up in URLs, headers or error bodies.
export function redact(value: string): string {
  return value
    .replace(/Bearer\s+[A-Za-z0-9._-]+/g, 'Bearer [REDACTED]')
    .replace(/(api[_-]?key\s*[:=]\s*)([^\s"',]+)/gi, '$1[REDACTED]')
    .replace(/(token\s*[:=]\s*)([^\s"',]+)/gi, '$1[REDACTED]');
}

function isPlainObject(v: unknown): v is Record<string, unknown> {
  if (typeof v !== 'object' || v === null) return false;
  const proto = Object.getPrototypeOf(v);
  return proto === Object.prototype || proto === null;
}

// Console arguments keep their shape; strings inside metadata objects are masked too.
export function scrub(v: unknown, depth = 0): unknown {
  if (typeof v === 'string') return redact(v);
  if (v instanceof Error) return redact(`${v.name}: ${v.message}`);
  if (depth >= 4) return v;
  if (Array.isArray(v)) return v.map((item) => scrub(item, depth + 1));
  if (isPlainObject(v)) {
    const out: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(v)) out[key] = scrub(value, depth + 1);
    return out;
  }
  return v;
}

function fmt(level: Level, args: unknown[]) {
  const ts = localTs();
  const tag = color(level);
  return [`[${ts}] ${tag}`, ...args.map((v) => scrub(v))];
}

function writeFileLog(level: Level, args: unknown[]) {
  if (!fileEnabled) return;
  if (!fileReady) {
    mkdirSync(dirname(logFile), { recursive: true });
    fileReady = true;
  }
  const ts = localTs();
  const msg = args
    .map((v) => {
      if (typeof v === 'string') return redact(v);
      if (v instanceof Error) return redact(`${v.name}: ${v.message}`);
      try {
        return redact(JSON.stringify(v));
      } catch {
        return String(v);
      }
    })
    .join(' ');
  appendFileSync(logFile, `[${ts}] [${level}] ${msg}\n`, 'utf8');
}

function emit(level: Level, sink: (...data: unknown[]) => void, args: unknown[]) {
  if (levelOrder[level] < minLevel) return;
  if (consoleEnabled) sink(...fmt(level, args));
  writeFileLog(level, args);
}

export const logger = {
  info: (...args: unknown[]) => emit('INFO', console.log, args),
  warn: (...args: unknown[]) => emit('WARN', console.warn, args),
  error: (...args: unknown[]) => emit('ERROR', console.error, args),
  debug: (...args: unknown[]) => emit('DEBUG', console.log, args)
};
