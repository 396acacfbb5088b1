import { buildApp } from './app';
import { env } from './config/env';
import { createDefaultDeps } from './deps';

const deps = createDefaultDeps();
const app = buildApp(deps);

const start = async (): Promise<void> => {
  try {
    await app.listen({ port: env.PORT, host: '0.0.0.0' });

    await deps.telemetry.logEvent({
      type: 'server.started',
      payload: { port: env.PORT, env: env.NODE_ENV },
    });
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
};

void start();
