/**
 * Public Resolution Routes
 *
 * Endpoints:
 *   GET /:code               - Redirect to the destination (302)
 *   GET /links/:code/resolve - Destination as JSON
 *
 * Both count a click. Disabled links answer 410, unknown codes 404.
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { z } from "zod";
import { sendFailure, sendValidationError } from "./respond.js";

const codeParamsSchema = z.object({
  code: z.string().min(1),
});

const codeParams = {
  type: "object",
  required: ["code"],
  properties: {
    code: { type: "string", description: "Short code" },
  },
} as const;

/**
 * GET /:code - Redirect to the destination
 */
async function redirectHandler(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
  const parseResult = codeParamsSchema.safeParse(request.params);
  if (!parseResult.success) {
    return sendValidationError(reply, parseResult.error);
  }

  const result = await request.server.services.resolver.resolve(parseResult.data.code);
  if (!result.success) {
    return sendFailure(reply, result);
  }

  return reply.code(302).redirect(result.data);
}

/**
 * GET /links/:code/resolve - Destination as JSON
 */
async function resolveHandler(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
  const parseResult = codeParamsSchema.safeParse(request.params);
  if (!parseResult.success) {
    return sendValidationError(reply, parseResult.error);
  }

  const { code } = parseResult.data;
  const result = await request.server.services.resolver.resolve(code);
  if (!result.success) {
    return sendFailure(reply, result);
  }

  return reply.status(200).send({ success: true, data: { code, destination: result.data } });
}

export async function redirectRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get("/links/:code/resolve", {
    schema: {
      description: "Resolve a short code to its destination and count the click",
      tags: ["redirect"],
      params: codeParams,
    },
    handler: resolveHandler,
  });

  fastify.get("/:code", {
    schema: {
      description: "Redirect to the destination for a short code",
      tags: ["redirect"],
      params: codeParams,
    },
    handler: redirectHandler,
  });
}
