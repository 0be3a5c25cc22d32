/**
 * Authentication Routes
 *
 * Endpoints:
 *   POST /auth/register  - Register a new user
 *   POST /auth/login     - Login and get JWT token
 *   GET  /auth/me        - Get current user profile
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { z } from "zod";
import type { SafeUser } from "@shortlane/db";
import type { AuthSession } from "../../services/index.js";
import { currentUser, requireAuth } from "../../middleware/auth.js";
import { sendFailure, sendValidationError } from "../respond.js";

// ============================================================================
// Request Schemas (Zod)
// ============================================================================

const registerSchema = z.object({
  email: z.string().trim().email("Invalid email format").max(255, "Email too long"),
  password: z.string().min(8, "Password must be at least 8 characters").max(128, "Password too long"),
});

const loginSchema = z.object({
  email: z.string().trim().email("Invalid email format").max(255, "Email too long"),
  password: z.string().min(1, "Password is required").max(128, "Password too long"),
});

function toUserResponse(user: SafeUser) {
  return {
    id: user.id,
    email: user.email,
    active: user.active,
    createdAt: user.createdAt.toISOString(),
    updatedAt: user.updatedAt.toISOString(),
  };
}

function toSessionResponse(session: AuthSession) {
  return { token: session.token, user: toUserResponse(session.user) };
}

// ============================================================================
// Route Handlers
// ============================================================================

/**
 * POST /auth/register - Register a new user
 */
async function registerHandler(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
  const parseResult = registerSchema.safeParse(request.body);
  if (!parseResult.success) {
    return sendValidationError(reply, parseResult.error);
  }

  const result = await request.server.services.auth.register(parseResult.data);
  if (!result.success) {
    return sendFailure(reply, result);
  }

  return reply.status(201).send({ success: true, data: toSessionResponse(result.data) });
}

/**
 * POST /auth/login - Login and get JWT token
 */
async function loginHandler(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
  const parseResult = loginSchema.safeParse(request.body);
  if (!parseResult.success) {
    return sendValidationError(reply, parseResult.error);
  }

  const result = await request.server.services.auth.login(parseResult.data);
  if (!result.success) {
    return sendFailure(reply, result);
  }

  return reply.status(200).send({ success: true, data: toSessionResponse(result.data) });
}

/**
 * GET /auth/me - Get current user profile
 */
async function meHandler(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
  return reply.status(200).send({ success: true, data: toUserResponse(currentUser(request)) });
}

// ============================================================================
// Route Registration
// ============================================================================

/**
 * Register auth routes
 */
export async function authRoutes(fastify: FastifyInstance): Promise<void> {
  const authLimit = {
    rateLimit: { max: fastify.appConfig.rateLimit.authMax, timeWindow: "1 minute" },
  };

  fastify.post("/auth/register", {
    config: authLimit,
    schema: {
      description: "Register a new user account",
      tags: ["auth"],
    },
    handler: registerHandler,
  });

  fastify.post("/auth/login", {
    config: authLimit,
    schema: {
      description: "Login and receive a JWT token",
      tags: ["auth"],
    },
    handler: loginHandler,
  });

  fastify.get("/auth/me", {
    preHandler: requireAuth,
    schema: {
      description: "Get current user profile",
      tags: ["auth"],
      security: [{ bearerAuth: [] }],
    },
    handler: meHandler,
  });
}
