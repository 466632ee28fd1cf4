import { serve } from '@hono/node-server';
import { createDb, pingDb } from '@upcheck/db';
import { config as loadDotenv } from 'dotenv';

import { createApp } from './app';
import { parseEnv } from './env';
import { createProbe } from './monitor/probe';

async function main(): Promise<void> {
  const dotenv = loadDotenv();
  if (dotenv.error) {
    console.warn('env: no .env file loaded, using process environment');
  }

  const env = parseEnv(process.env);

  const db = createDb(env.DATABASE_URL);
  try {
    await pingDb(db);
  } catch (err) {
    await db.close();
    throw new Error('Unable to reach the database', { cause: err });
  }

  const app = createApp({
    db,
    apiKey: env.API_KEY,
    probe: createProbe({
      timeoutMs: env.PROBE_TIMEOUT_MS,
      allowPrivateTargets: env.ALLOW_PRIVATE_TARGETS,
    }),
  });

  const server = serve({ fetch: app.fetch, port: env.PORT }, (info) => {
    console.log(`server: listening on port ${info.port}`);
  });

  const shutdown = (signal: string) => {
    console.log(`server: ${signal} received, shutting down`);
    server.close(() => {
      db.close().catch((err: unknown) => {
        console.error('server: failed to close database pool', err);
      });
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  console.error('server: startup failed', err);
  process.exit(1);
});
