import pino from 'pino';
import { config, type Config } from './config';

// stdout is reserved for the dialogue and the password itself
export function createLogger(cfg: Config) {
  if (cfg.nodeEnv === 'development') {
    return pino({
      level: cfg.logLevel,
      transport: { target: 'pino-pretty', options: { colorize: true, destination: 2 } }
    });
  }
  return pino({ level: cfg.logLevel }, pino.destination({ dest: 2, sync: true }));
}

export const logger = createLogger(config);
