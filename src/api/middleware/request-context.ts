import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import fp from 'fastify-plugin';
import { v4 as uuid } from 'uuid';
import type { TelemetryService } from '../../services/telemetry.service';

declare module 'fastify' {
  interface FastifyRequest {
    requestId: string;
  }
}

export interface RequestContextOptions {
  telemetry: TelemetryService;
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Fastify plugin: attaches a request_id to every request (the caller's
 * x-request-id when given) and logs structured api.request.start /
 * api.request.end entries and telemetry events with route, status_code
 * and duration_ms.
 */
async function requestContextPlugin(
  app: FastifyInstance,
  options: RequestContextOptions,
): Promise<void> {
  const { telemetry } = options;

  app.decorateRequest('requestId', '');

  app.addHook('onRequest', async (request: FastifyRequest) => {
    request.requestId = headerValue(request.headers['x-request-id']) || uuid();
  });

  app.addHook('preHandler', async (request: FastifyRequest) => {
    const route = request.routeOptions.url ?? request.url;
    request.log.info(
      { requestId: request.requestId, route, method: request.method },
      'api.request.start',
    );
  });

  app.addHook('onSend', async (request: FastifyRequest, reply: FastifyReply, payload) => {
    reply.header('x-request-id', request.requestId);
    return payload;
  });

  app.addHook('onResponse', async (request: FastifyRequest, reply: FastifyReply) => {
    const durationMs = Math.round(reply.elapsedTime);
    const route = request.routeOptions.url ?? request.url;

    request.log.info(
      {
        requestId: request.requestId,
        route,
        method: request.method,
        statusCode: reply.statusCode,
        durationMs,
      },
      'api.request.end',
    );

    // logEvent never rejects; awaiting keeps the write inside the hook.
    await telemetry.logEvent({
      type: 'api.request.end',
      payload: { route, method: request.method, statusCode: reply.statusCode },
      requestId: request.requestId,
      durationMs,
    });
  });
}

export default fp(requestContextPlugin, {
  name: 'request-context',
});
