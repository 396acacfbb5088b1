import pino from 'pino';
import { env } from './env';

// Shared structured logger for everything outside the request lifecycle.
// Route handlers use request.log, which Fastify configures with the same level.
export const logger = pino({
  level: env.LOG_LEVEL,
  redact: ['password', 'token', 'credentials.password', '*.password'],
  transport:
    env.NODE_ENV === 'development'
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined,
});
