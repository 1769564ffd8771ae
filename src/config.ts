import dotenv from 'dotenv';

dotenv.config();

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

export type Config = {
  nodeEnv: string;
  logLevel: LogLevel;
};

function isLogLevel(value: string): value is LogLevel {
  const levels: readonly string[] = LOG_LEVELS;
  return levels.includes(value);
}

function optionalLogLevel(name: string, value: string | undefined, fallback: LogLevel): LogLevel {
  if (value === undefined || value === '') return fallback;
  const level = value.trim().toLowerCase();
  if (!isLogLevel(level)) throw new Error(`Invalid ${name}: ${value}`);
  return level;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const cfg: Config = {
    nodeEnv: env.NODE_ENV || 'development',
    logLevel: optionalLogLevel('LOG_LEVEL', env.LOG_LEVEL, 'warn')
  };
  return cfg;
}

export const config = loadConfig();
