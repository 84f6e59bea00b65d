/**
 * backend/src/app/build-app.ts
 *
 * WHY:
 * - Single place that assembles the runnable Fastify app:
 *   config -> deps -> server -> routes
 * - Makes E2E tests simple (build once, app.inject, close).
 *
 * HOW TO USE:
 * - buildApp(config)                 -> Postgres + Redis (real infra)
 * - buildApp(config, { infra })      -> caller-provided infra (tests)
 *
 * RULES:
 * - No business logic here (only composition).
 * - No request handlers here (those belong in routes/modules).
 */

import type { AppConfig } from './config';
import { buildInfra, createAppDeps, type AppInfra } from './di';
import { buildServer } from './server';
import { registerRoutes } from './routes';

export async function buildApp(config: AppConfig, opts: { infra?: AppInfra } = {}) {
  const infra = opts.infra ?? (await buildInfra(config));
  const deps = createAppDeps(config, infra);
  const app = await buildServer({ config, deps });

  registerRoutes(app, { config, deps });

  await app.ready();

  const close = async () => {
    await app.close();
    await deps.close();
  };

  return { app, deps, close };
}
