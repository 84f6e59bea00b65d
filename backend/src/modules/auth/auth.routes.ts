/**
 * src/modules/auth/auth.routes.ts
 *
 * WHY:
 * - Declares Auth module endpoints.
 * - Keeps routing separate from controller logic.
 *
 * RATE LIMITS (on top of the app-wide default preset):
 * - strict:             login, refresh, reset-password, verify-email
 * - expensiveOperation: register, forgot-password
 * - authenticatedUser:  me, logout, session/refresh
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import { applyRateLimit, RATE_LIMIT_PRESETS } from '../../shared/http/rate-limit-hooks';
import type { RateLimiter } from '../../shared/security/rate-limit';
import type { AuthController } from './auth.controller';

export function registerAuthRoutes(
  app: FastifyInstance,
  controller: AuthController,
  rateLimiter: RateLimiter,
) {
  app.register(async (scope) => {
    applyRateLimit(scope, rateLimiter, RATE_LIMIT_PRESETS.strict);

    scope.post('/auth/login', controller.login.bind(controller));
    scope.post('/auth/refresh', controller.refresh.bind(controller));
    scope.post('/auth/reset-password', controller.resetPassword.bind(controller));
    scope.post('/auth/verify-email', controller.verifyEmail.bind(controller));
  });

  app.register(async (scope) => {
    applyRateLimit(scope, rateLimiter, RATE_LIMIT_PRESETS.expensiveOperation);

    scope.post('/auth/register', controller.register.bind(controller));
    scope.post('/auth/forgot-password', controller.forgotPassword.bind(controller));
  });

  app.register(async (scope) => {
    applyRateLimit(scope, rateLimiter, RATE_LIMIT_PRESETS.authenticatedUser);

    scope.get('/auth/me', controller.me.bind(controller));
    scope.post('/auth/logout', controller.logout.bind(controller));
    scope.post('/auth/session/refresh', controller.refreshSession.bind(controller));
  });
}
