import fastify, { type FastifyInstance } from 'fastify';
import { env } from './config/env';
import { createDefaultDeps, type AppDeps } from './deps';
import requestContextPlugin from './api/middleware/request-context';
import { healthRoutes } from './api/health';
import { versionRoutes } from './api/version';
import { reservationRoutes } from './api/reservations';

/**
 * Creates and configures the Fastify application.
 * Exported as a factory so tests can create isolated instances with their own deps.
 */
export function buildApp(deps: AppDeps = createDefaultDeps()): FastifyInstance {
  const app = fastify({
    logger: {
      level: env.LOG_LEVEL,
      transport:
        env.NODE_ENV === 'development'
          ? { target: 'pino-pretty', options: { colorize: true } }
          : undefined,
    },
  });

  // Middleware: request_id + structured logging on all routes
  void app.register(requestContextPlugin, { telemetry: deps.telemetry });

  // Register routes
  void app.register(healthRoutes);
  void app.register(versionRoutes);
  void app.register(reservationRoutes, { deps });

  return app;
}
