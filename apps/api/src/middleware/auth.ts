/**
 * Authentication Middleware
 *
 * Fastify hooks and decorators for JWT-based authentication.
 */

import type {
  FastifyInstance,
  FastifyRequest,
  FastifyReply,
  FastifyPluginAsync,
  preHandlerHookHandler,
} from "fastify";
import fp from "fastify-plugin";
import type { SafeUser } from "@shortlane/db";

// ============================================================================
// Type Augmentation
// ============================================================================

declare module "fastify" {
  interface FastifyRequest {
    /** Current user if authenticated */
    user: SafeUser | null;
    /** User ID if authenticated */
    userId: string | null;
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Extract Bearer token from Authorization header
 */
function extractBearerToken(request: FastifyRequest): string | null {
  const authHeader = request.headers.authorization;

  if (!authHeader) {
    return null;
  }

  const [type, token] = authHeader.split(" ");

  if (type !== "Bearer" || !token) {
    return null;
  }

  return token;
}

/**
 * Resolve the active user behind the request's token, if any
 */
async function authenticate(request: FastifyRequest): Promise<SafeUser | null> {
  const token = extractBearerToken(request);
  if (!token) {
    return null;
  }

  const { auth } = request.server.services;
  const payload = auth.verifyToken(token);
  if (!payload) {
    return null;
  }

  return auth.getActiveUser(payload.userId);
}

// ============================================================================
// Middleware Hooks
// ============================================================================

/**
 * Required authentication hook
 *
 * Returns 401 unless the request carries a valid token for an active user.
 *
 * Usage:
 * ```ts
 * fastify.get("/protected", { preHandler: requireAuth }, handler);
 * ```
 */
export const requireAuth: preHandlerHookHandler = async (request: FastifyRequest, reply: FastifyReply) => {
  const user = await authenticate(request);

  if (!user) {
    return reply.status(401).send({
      success: false,
      error: "Authentication required",
      errorCode: "UNAUTHORIZED",
    });
  }

  request.user = user;
  request.userId = user.id;
};

/**
 * The authenticated user's id. Only valid behind requireAuth.
 */
export function currentUserId(request: FastifyRequest): string {
  if (!request.userId) {
    throw Object.assign(new Error("Authentication required"), { statusCode: 401 });
  }
  return request.userId;
}

/**
 * The authenticated user. Only valid behind requireAuth.
 */
export function currentUser(request: FastifyRequest): SafeUser {
  if (!request.user) {
    throw Object.assign(new Error("Authentication required"), { statusCode: 401 });
  }
  return request.user;
}

// ============================================================================
// Fastify Plugin
// ============================================================================

/**
 * Authentication plugin
 *
 * Registers the request decorators the hooks fill in.
 *
 * Usage:
 * ```ts
 * await fastify.register(authPlugin);
 * ```
 */
const authPluginCallback: FastifyPluginAsync = async (fastify: FastifyInstance): Promise<void> => {
  fastify.decorateRequest("user", null);
  fastify.decorateRequest("userId", null);
};

export const authPlugin = fp(authPluginCallback, {
  name: "auth-plugin",
  fastify: "4.x",
});
