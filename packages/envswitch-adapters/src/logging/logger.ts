export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const normalized = value?.trim().toLowerCase() ?? '';
  return isLogLevel(normalized) ? normalized : fallback;
}

// Error instances serialize to {} otherwise
function replacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

function fmt(level: LogLevel, msg: string, extra?: unknown): string {
  const time = new Date().toISOString();
  if (extra === undefined) {
    return `[envswitch] ${time} ${level.toUpperCase()} ${msg}`;
  }
  return `[envswitch] ${time} ${level.toUpperCase()} ${msg} ${JSON.stringify(extra, replacer)}`;
}

export const logger = {
  level: parseLogLevel(process.env.ENVSWITCH_LOG_LEVEL),

  setLevel(level: LogLevel): void {
    this.level = level;
  },
  enabled(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.level];
  },
  debug(msg: string, extra?: unknown): void {
    if (this.enabled('debug')) { console.debug(fmt('debug', msg, extra)); }
  },
  info(msg: string, extra?: unknown): void {
    if (this.enabled('info')) { console.info(fmt('info', msg, extra)); }
  },
  warn(msg: string, extra?: unknown): void {
    if (this.enabled('warn')) { console.warn(fmt('warn', msg, extra)); }
  },
  error(msg: string, extra?: unknown): void {
    console.error(fmt('error', msg, extra));
  },
};
