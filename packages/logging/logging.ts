import log from 'loglevel';

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevelName = (typeof LOG_LEVELS)[number];

function isLogLevelName(value: string): value is LogLevelName {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function resolveLogLevel(value: string | undefined): LogLevelName {
  const normalized = value?.trim().toLowerCase();
  return normalized && isLogLevelName(normalized) ? normalized : 'info';
}

export const logLevel = resolveLogLevel(
  typeof process !== 'undefined' ? process.env?.LOG_LEVEL : undefined
);
let currentLevel: LogLevelName = logLevel;
log.setLevel(currentLevel);

/**
 * Named child logger, e.g. `getLogger('state-store')`, prefixing every line with `[state-store]`.
 * Starts at the current level; `setLogLevel` moves every logger together.
 */
const namedLoggers = new Map<string, log.Logger>();

export function getLogger(name: string): log.Logger {
  const existing = namedLoggers.get(name);
  if (existing) {
    return existing;
  }

  const logger = log.getLogger(name);
  const originalFactory = logger.methodFactory;
  logger.methodFactory = (methodName, level, loggerName) => {
    const rawMethod = originalFactory(methodName, level, loggerName);
    return (...args: unknown[]) => rawMethod(`[${name}]`, ...args);
  };
  logger.setLevel(currentLevel);
  namedLoggers.set(name, logger);
  return logger;
}

/** Change the level of the root logger and every named logger, e.g. to keep stdout clean for `--json` */
export function setLogLevel(level: LogLevelName): void {
  currentLevel = level;
  log.setLevel(level);
  for (const logger of namedLoggers.values()) {
    logger.setLevel(level);
  }
}

export { log };
