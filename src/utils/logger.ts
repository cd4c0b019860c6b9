type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogFormat = 'pretty' | 'json';

interface LogEntry {
  level: LogLevel;
  module: string;
  message: string;
  data?: Record<string, unknown>;
  timestamp: string;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LOG_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m',  // cyan
  info: '\x1b[32m',   // green
  warn: '\x1b[33m',   // yellow
  error: '\x1b[31m',  // red
};

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';
const BOLD = '\x1b[1m';

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value);
}

function getMinLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

// Host apps that ship logs to a collector set LOG_FORMAT=json
function getFormat(): LogFormat {
  return process.env.LOG_FORMAT?.toLowerCase() === 'json' ? 'json' : 'pretty';
}

function formatPretty(entry: LogEntry): string {
  const color = LOG_COLORS[entry.level];
  const levelStr = entry.level.toUpperCase().padEnd(5);
  const time = entry.timestamp.split('T')[1]?.replace('Z', '') ?? entry.timestamp;

  let line = `${DIM}${time}${RESET} ${color}${levelStr}${RESET} ${BOLD}[${entry.module}]${RESET} ${entry.message}`;

  if (entry.data && Object.keys(entry.data).length > 0) {
    const dataStr = Object.entries(entry.data)
      .map(([k, v]) => {
        const val = typeof v === 'string' ? v : JSON.stringify(v);
        return `${DIM}${k}=${RESET}${val}`;
      })
      .join(' ');
    line += ` ${dataStr}`;
  }

  return line;
}

function formatJson(entry: LogEntry): string {
  return JSON.stringify({
    time: entry.timestamp,
    level: entry.level,
    module: entry.module,
    msg: entry.message,
    ...entry.data,
  });
}

const WRITERS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

export class Logger {
  constructor(readonly module: string) {}

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[getMinLevel()]) return;

    const entry: LogEntry = { level, module: this.module, message, data, timestamp: new Date().toISOString() };
    WRITERS[level](getFormat() === 'json' ? formatJson(entry) : formatPretty(entry));
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  /** Logs `<label> started` now and `<label> completed` with `durationMs` when the returned callback runs. */
  time(label: string): () => void {
    const start = performance.now();
    this.debug(`${label} started`);
    return () => {
      this.debug(`${label} completed`, { durationMs: Math.round(performance.now() - start) });
    };
  }
}

export function createLogger(module: string): Logger {
  return new Logger(`inkpress:${module}`);
}
