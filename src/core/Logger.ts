import winston from 'winston';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LEVELS.some((l) => l === value);
}

const timestamp = winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' });
const printfFmt = winston.format.printf((info: winston.Logform.TransformableInfo) => {
  const level = String(info.level || '').toUpperCase();
  const ts = typeof info.timestamp === 'string' ? info.timestamp : new Date().toISOString();
  const msg = typeof info.message === 'string' ? info.message : JSON.stringify(info.message);
  const scope = typeof info.scope === 'string' ? `${info.scope}: ` : '';
  return `${ts} [${level}] ${scope}${msg}`;
});

const envLevel = process.env.LOG_LEVEL;

// Один корневой логгер на процесс; модули получают дочерние с собственным scope.
const root = winston.createLogger({
  level: isLogLevel(envLevel) ? envLevel : 'info',
  format: winston.format.combine(timestamp, printfFmt),
  transports: [new winston.transports.Console()],
});

/**
 * Возвращает логгер модуля. Уровень общий для всех логгеров и меняется через {@link setLogLevel}.
 * @param scope Префикс сообщений (обычно имя модуля)
 */
export function createLogger(scope?: string): winston.Logger {
  return scope ? root.child({ scope }) : root;
}

export function setLogLevel(level: LogLevel): void {
  root.level = level;
}

export function getLogLevel(): string {
  return root.level;
}

export type AppLogger = ReturnType<typeof createLogger>;

/** Текст ошибки для лога: catch получает unknown. */
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
