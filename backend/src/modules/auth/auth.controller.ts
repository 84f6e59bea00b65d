/**
 * src/modules/auth/auth.controller.ts
 *
 * WHY:
 * - Maps HTTP → service call for all auth endpoints.
 * - Returns structured response.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Body validation with zod; failures are 400 with the issues in meta (logged, not sent).
 * - Endpoints that need a principal call requireAuth() first.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { z } from 'zod';
import {
  forgotPasswordSchema,
  loginSchema,
  refreshSchema,
  registerSchema,
  resetPasswordSchema,
  sessionRefreshSchema,
  verifyEmailSchema,
} from './auth.schemas';
import { AppError } from '../../shared/http/errors';
import { requireAuth } from '../../shared/http/require-auth-context';
import type { AuthService } from './auth.service';

const FORGOT_PASSWORD_RESPONSE = {
  message: 'If an account with that email exists, a password reset link has been sent.',
} as const;

const RESET_PASSWORD_RESPONSE = {
  message: 'Password updated successfully. Please sign in with your new password.',
} as const;

const VERIFY_EMAIL_RESPONSE = { message: 'Email verified.' } as const;

const LOGOUT_RESPONSE = { message: 'Logged out.' } as const;

function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw AppError.validationError('Invalid request body', {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

export class AuthController {
  constructor(private readonly authService: AuthService) {}

  async register(req: FastifyRequest, reply: FastifyReply) {
    const body = parseBody(registerSchema, req.body);

    const user = await this.authService.register({
      username: body.username,
      email: body.email,
      password: body.password,
    });

    return reply.status(201).send({ user });
  }

  async login(req: FastifyRequest, reply: FastifyReply) {
    const body = parseBody(loginSchema, req.body);

    const result = await this.authService.login({
      email: body.email,
      password: body.password,
      ip: req.requestContext.ip,
      userAgent: req.requestContext.userAgent,
    });

    return reply.status(200).send(result);
  }

  async refresh(req: FastifyRequest, reply: FastifyReply) {
    const body = parseBody(refreshSchema, req.body);
    const result = await this.authService.refresh(body.refreshToken);
    return reply.status(200).send(result);
  }

  async forgotPassword(req: FastifyRequest, reply: FastifyReply) {
    const body = parseBody(forgotPasswordSchema, req.body);
    await this.authService.generateResetToken(body.email);
    return reply.status(200).send(FORGOT_PASSWORD_RESPONSE);
  }

  async resetPassword(req: FastifyRequest, reply: FastifyReply) {
    const body = parseBody(resetPasswordSchema, req.body);

    await this.authService.resetPassword({
      token: body.token,
      email: body.email,
      newPassword: body.newPassword,
      confirmPassword: body.confirmPassword,
    });

    return reply.status(200).send(RESET_PASSWORD_RESPONSE);
  }

  async verifyEmail(req: FastifyRequest, reply: FastifyReply) {
    const body = parseBody(verifyEmailSchema, req.body);
    await this.authService.verifyEmail(body.token);
    return reply.status(200).send(VERIFY_EMAIL_RESPONSE);
  }

  async logout(req: FastifyRequest, reply: FastifyReply) {
    const auth = requireAuth(req);
    await this.authService.logout(auth.userId);
    return reply.status(200).send(LOGOUT_RESPONSE);
  }

  async me(req: FastifyRequest, reply: FastifyReply) {
    const auth = requireAuth(req);
    const result = await this.authService.getCurrentUser(auth.userId);
    return reply.status(200).send(result);
  }

  async refreshSession(req: FastifyRequest, reply: FastifyReply) {
    const auth = requireAuth(req);
    const body = parseBody(sessionRefreshSchema, req.body);

    const session = await this.authService.refreshSession(auth.userId, body.sessionId);

    return reply.status(200).send({
      session: { id: session.id, createdAt: session.createdAt, expiresAt: session.expiresAt },
    });
  }
}
