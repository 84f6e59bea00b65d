/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * ORDER (matters):
 * 1) request context (requestId, ip, user agent)
 * 2) bearer auth context (needs the auth service)
 * 3) app-wide default rate limit (principal keys need 2)
 * 4) error handler
 */

import Fastify from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';
import { registerRequestContext } from '../shared/http/request-context';
import { registerAuthContext } from '../shared/http/auth-context';
import { registerErrorHandler } from '../shared/http/error-handler';
import { applyRateLimit, RATE_LIMIT_PRESETS } from '../shared/http/rate-limit-hooks';

export async function buildServer(opts: { config: AppConfig; deps: AppDeps }) {
  const app = Fastify({
    logger: false, // we use our own Winston logger
    trustProxy: opts.config.nodeEnv === 'production',
  });

  registerRequestContext(app);
  registerAuthContext(app, (token) => opts.deps.auth.authService.validateAccessToken(token));

  applyRateLimit(app, opts.deps.rateLimiter, RATE_LIMIT_PRESETS.default);

  registerErrorHandler(app);

  app.addHook('onResponse', (req, reply, done) => {
    opts.deps.logger.debug('request.completed', {
      requestId: req.requestContext.requestId,
      method: req.method,
      url: req.url,
      statusCode: reply.statusCode,
      userId: req.authContext?.userId ?? null,
    });
    done();
  });

  return app;
}
