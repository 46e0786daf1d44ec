/* Simple structured logger helper so we can swap implementations later if needed */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 50,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

interface LevelState {
  level: LogLevel;
}

export class Logger {
  private readonly state: LevelState;

  constructor(
    level: LogLevel | LevelState = 'info',
    private readonly scope?: string,
  ) {
    this.state = typeof level === 'string' ? { level } : level;
  }

  setLevel(level: LogLevel) {
    this.state.level = level;
  }

  /** Scoped logger sharing this logger's level. */
  child(scope: string): Logger {
    return new Logger(this.state, this.scope ? `${this.scope}:${scope}` : scope);
  }

  debug(message: string, meta?: Record<string, unknown>) {
    if (!this.enabled('debug')) return;
    console.debug(`[DEBUG] ${this.prefix()}${message}`, meta ?? '');
  }

  info(message: string, meta?: Record<string, unknown>) {
    if (!this.enabled('info')) return;
    console.log(`[INFO] ${this.prefix()}${message}`, meta ?? '');
  }

  error(message: string, meta?: unknown) {
    if (!this.enabled('error')) return;
    console.error(`[ERROR] ${this.prefix()}${message}`, meta ?? '');
  }

  warn(message: string, meta?: Record<string, unknown>) {
    if (!this.enabled('warn')) return;
    console.warn(`[WARN] ${this.prefix()}${message}`, meta ?? '');
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.state.level];
  }

  private prefix(): string {
    const scope = this.scope ? `[${this.scope}] ` : '';
    return `${new Date().toISOString()} - ${scope}`;
  }
}

const initialLevel = process.env.LOG_LEVEL?.toLowerCase() ?? 'info';

export const logger = new Logger(isLogLevel(initialLevel) ? initialLevel : 'info');
