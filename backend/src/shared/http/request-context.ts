/**
 * backend/src/shared/http/request-context.ts
 *
 * WHY:
 * - We want a stable requestId for logs, debugging, and tracing.
 * - Login needs the caller's address and user agent for the session record.
 *
 * HOW TO USE:
 * - Registered once in app/server.ts via registerRequestContext(app).
 * - After registration, every request has `req.requestContext`.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { randomUUID } from 'node:crypto';

export type RequestContext = {
  requestId: string;
  ip: string;
  userAgent: string;
};

declare module 'fastify' {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}

function parseUserAgent(raw: unknown): string {
  if (typeof raw !== 'string') return '';
  // Header is client-controlled; keep it bounded.
  return raw.trim().slice(0, 512);
}

export function registerRequestContext(app: FastifyInstance) {
  app.decorateRequest('requestContext', null);

  // IMPORTANT: Fastify hooks must either be async OR accept `done`.
  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.requestContext = {
      requestId: randomUUID(),
      ip: req.ip,
      userAgent: parseUserAgent(req.headers['user-agent']),
    };

    done();
  });
}
