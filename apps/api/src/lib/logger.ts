import { pino, type Logger, type LevelWithSilent } from 'pino';

/** Process logger; handed to Fastify as its instance and to non-HTTP code. */
export function createLogger(level: LevelWithSilent, name?: string): Logger {
  return pino({ level, name });
}
