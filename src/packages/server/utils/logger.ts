/**
 * Colorized context logger for the viewer server.
 * Each line carries pid, timestamp, level, context and the caller's file:line.
 */

const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
};

type LogLevel = 'log' | 'error' | 'warn' | 'debug' | 'verbose';

const levelConfig: Record<LogLevel, { label: string; color: string }> = {
  log: { label: 'LOG', color: colors.green },
  error: { label: 'ERROR', color: colors.red },
  warn: { label: 'WARN', color: colors.yellow },
  debug: { label: 'DEBUG', color: colors.magenta },
  verbose: { label: 'VERBOSE', color: colors.cyan },
};

const SOURCE_ROOT = 'src/packages/';

function formatTimestamp(): string {
  return new Date().toLocaleString('en-US', {
    month: '2-digit',
    day: '2-digit',
    year: 'numeric',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hour12: false,
  });
}

interface CallerInfo {
  file: string;
  line: number;
}

function getCallerInfo(): CallerInfo | null {
  const stack = new Error().stack?.split('\n');

  // 0: "Error", 1: getCallerInfo, 2: formatMessage, 3: Logger method, 4: caller
  const callerLine = stack?.[4];
  if (!callerLine) return null;

  // "    at fn (/path/to/file.ts:12:3)" or "    at /path/to/file.ts:12:3"
  const match = callerLine.match(/at\s+(?:.*?\s+\()?(.+?):(\d+):(\d+)\)?$/);
  if (!match) return null;

  let filePath = match[1];
  const rootIndex = filePath.indexOf(SOURCE_ROOT);
  filePath = rootIndex !== -1
    ? filePath.slice(rootIndex + SOURCE_ROOT.length)
    : filePath.split('/').pop() ?? filePath;

  return { file: filePath, line: parseInt(match[2], 10) };
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) {
    return arg.stack ?? `${arg.name}: ${arg.message}`;
  }
  if (typeof arg === 'object' && arg !== null) {
    try {
      return JSON.stringify(arg);
    } catch {
      return String(arg);
    }
  }
  return String(arg);
}

function formatMessage(level: LogLevel, context: string, message: string, args: unknown[]): string {
  const { label, color } = levelConfig[level];
  const caller = getCallerInfo();

  const appName = `${colors.blue}[Viewer]${colors.reset}`;
  const pidStr = `${colors.dim}${process.pid}${colors.reset}`;
  const timestampStr = `${colors.dim}${formatTimestamp()}${colors.reset}`;
  const levelStr = `${color}${colors.bright}${label.padStart(7)}${colors.reset}`;
  const contextStr = `${colors.yellow}[${context}]${colors.reset}`;
  const callerStr = caller ? `${colors.dim}${caller.file}:${caller.line}${colors.reset}` : '';

  const body = args.length > 0
    ? `${message} ${colors.cyan}${args.map(formatArg).join(' ')}${colors.reset}`
    : message;

  return `${appName} ${pidStr}  - ${timestampStr}  ${levelStr} ${contextStr} ${callerStr} ${body}`;
}

class Logger {
  constructor(private readonly context: string) {}

  log(message: string, ...args: unknown[]): void {
    console.log(formatMessage('log', this.context, message, args));
  }

  error(message: string, ...args: unknown[]): void {
    console.error(formatMessage('error', this.context, message, args));
  }

  warn(message: string, ...args: unknown[]): void {
    console.warn(formatMessage('warn', this.context, message, args));
  }

  debug(message: string, ...args: unknown[]): void {
    if (process.env.DEBUG) {
      console.debug(formatMessage('debug', this.context, message, args));
    }
  }

  verbose(message: string, ...args: unknown[]): void {
    if (process.env.VERBOSE) {
      console.log(formatMessage('verbose', this.context, message, args));
    }
  }
}

export function createLogger(context: string): Logger {
  return new Logger(context);
}

export const logger = {
  server: createLogger('Server'),
  http: createLogger('HTTP'),
  ws: createLogger('WebSocket'),
  config: createLogger('Config'),
  viewer: createLogger('Viewer'),
  loader: createLogger('Loader'),
  sessions: createLogger('Sessions'),
};

