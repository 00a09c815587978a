import { config as loadEnv } from 'dotenv';

// Load environment variables
loadEnv();

const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
  readonly logLevel: LogLevel;
  // File transports are only attached when a directory is configured
  readonly logDir?: string;
  readonly silent: boolean;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const level = (env.LOG_LEVEL ?? '').trim().toLowerCase();
  const logDir = env.LOG_DIR?.trim();

  return {
    logLevel: isLogLevel(level) ? level : 'info',
    logDir: logDir ? logDir : undefined,
    silent: env.NODE_ENV === 'test',
  };
}
