import pino from 'pino';

const isTest = process.env.NODE_ENV === 'test';

export const logger = pino({
  name: 'adforge',
  level: process.env.LOG_LEVEL ?? (isTest ? 'silent' : 'info'),
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: { paths: ['apiKey', '*.apiKey', 'OPENAI_API_KEY', 'GEMINI_API_KEY'], remove: true }
});

export type Logger = typeof logger;

// pino children copy the level at creation, so later changes are pushed to each one.
const scopedLoggers: Logger[] = [];

export const createScopedLogger = (scope: string): Logger => {
  const child = logger.child({ scope });
  scopedLoggers.push(child);
  return child;
};

/** Applies a level read after startup (for example from `.env`) to every logger. */
export const setLogLevel = (level: pino.LevelWithSilent): void => {
  logger.level = level;
  for (const child of scopedLoggers) {
    child.level = level;
  }
};
