/**
 * Link Management Routes
 *
 * Endpoints:
 *   POST   /links              - Create a new short link
 *   GET    /links              - List the caller's links
 *   GET    /links/check        - Check custom code availability
 *   GET    /links/:code        - Get a link
 *   GET    /links/:code/stats  - Click statistics (owner only)
 *   PATCH  /links/:code        - Update destination, title or enabled (owner only)
 *   DELETE /links/:code        - Delete a link (owner only)
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { z } from "zod";
import { TITLE_MAX_LENGTH } from "@shortlane/shared";
import { DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE } from "../../services/index.js";
import { currentUserId, requireAuth } from "../../middleware/auth.js";
import { sendFailure, sendValidationError, toLinkResponse } from "../respond.js";

// ============================================================================
// Request Schemas (Zod)
// ============================================================================

const titleSchema = z.string().trim().max(TITLE_MAX_LENGTH, `Title too long (max ${TITLE_MAX_LENGTH} characters)`);

const createLinkSchema = z.object({
  destination: z.string({ required_error: "Destination URL is required" }),
  code: z.string().optional(),
  title: titleSchema.nullish(),
});

const updateLinkSchema = z
  .object({
    destination: z.string().optional(),
    title: titleSchema.nullable().optional(),
    enabled: z.boolean().optional(),
  })
  .strict()
  .refine((patch) => Object.keys(patch).length > 0, "Nothing to update");

const listLinksSchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  pageSize: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(DEFAULT_PAGE_SIZE),
  enabled: z
    .enum(["true", "false"])
    .transform((value) => value === "true")
    .optional(),
  createdFrom: z.coerce.date().optional(),
  createdTo: z.coerce.date().optional(),
  search: z.string().trim().min(1).max(200).optional(),
});

const checkCodeSchema = z.object({
  code: z.string().min(1, "Code is required"),
});

const codeParamsSchema = z.object({
  code: z.string().min(1),
});

// ============================================================================
// Route Handlers
// ============================================================================

/**
 * POST /links - Create a new short link
 */
async function createLinkHandler(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
  const parseResult = createLinkSchema.safeParse(request.body);
  if (!parseResult.success) {
    return sendValidationError(reply, parseResult.error);
  }

  const { destination, code, title } = parseResult.data;
  const { services, appConfig } = request.server;

  const result = await services.registry.create({
    ownerId: currentUserId(request),
    destination,
    code,
    title: title || null,
  });

  if (!result.success) {
    return sendFailure(reply, result);
  }

  return reply.status(201).send({
    success: true,
    data: toLinkResponse(result.data, appConfig.shortUrlBase),
  });
}

/**
 * GET /links - List the caller's links, newest first
 */
async function listLinksHandler(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
  const parseResult = listLinksSchema.safeParse(request.query);
  if (!parseResult.success) {
    return sendValidationError(reply, parseResult.error);
  }

  const { page, pageSize, ...filters } = parseResult.data;
  const { services, appConfig } = request.server;

  const result = await services.registry.listForOwner(currentUserId(request), { page, pageSize }, filters);

  return reply.status(200).send({
    success: true,
    data: {
      items: result.items.map((link) => toLinkResponse(link, appConfig.shortUrlBase)),
      total: result.total,
      page: result.page,
      pageSize: result.pageSize,
      totalPages: result.totalPages,
    },
  });
}

/**
 * GET /links/check?code=xxx - Check custom code availability
 */
async function checkCodeHandler(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
  const parseResult = checkCodeSchema.safeParse(request.query);
  if (!parseResult.success) {
    return sendValidationError(reply, parseResult.error);
  }

  const availability = await request.server.services.arbiter.checkAvailability(parseResult.data.code);

  return reply.status(200).send({ success: true, data: availability });
}

/**
 * GET /links/:code - Get a link
 */
async function getLinkHandler(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
  const parseResult = codeParamsSchema.safeParse(request.params);
  if (!parseResult.success) {
    return sendValidationError(reply, parseResult.error);
  }

  const { services, appConfig } = request.server;
  const result = await services.registry.get(parseResult.data.code);

  if (!result.success) {
    return sendFailure(reply, result);
  }

  return reply.status(200).send({
    success: true,
    data: toLinkResponse(result.data, appConfig.shortUrlBase),
  });
}

/**
 * GET /links/:code/stats - Click statistics for the owner
 */
async function statsHandler(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
  const parseResult = codeParamsSchema.safeParse(request.params);
  if (!parseResult.success) {
    return sendValidationError(reply, parseResult.error);
  }

  const result = await request.server.services.resolver.stats(parseResult.data.code, currentUserId(request));

  if (!result.success) {
    return sendFailure(reply, result);
  }

  const { code, clickCount, lastClickedAt, createdAt } = result.data;
  return reply.status(200).send({
    success: true,
    data: {
      code,
      clickCount,
      lastClickedAt: lastClickedAt?.toISOString() ?? null,
      createdAt: createdAt.toISOString(),
    },
  });
}

/**
 * PATCH /links/:code - Update an owned link
 */
async function updateLinkHandler(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
  const params = codeParamsSchema.safeParse(request.params);
  if (!params.success) {
    return sendValidationError(reply, params.error);
  }

  const body = updateLinkSchema.safeParse(request.body);
  if (!body.success) {
    return sendValidationError(reply, body.error);
  }

  const { services, appConfig } = request.server;
  const { title, ...rest } = body.data;
  const result = await services.registry.update(params.data.code, currentUserId(request), {
    ...rest,
    // an empty title clears it
    title: title === undefined ? undefined : title || null,
  });

  if (!result.success) {
    return sendFailure(reply, result);
  }

  return reply.status(200).send({
    success: true,
    data: toLinkResponse(result.data, appConfig.shortUrlBase),
  });
}

/**
 * DELETE /links/:code - Delete an owned link
 */
async function deleteLinkHandler(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
  const parseResult = codeParamsSchema.safeParse(request.params);
  if (!parseResult.success) {
    return sendValidationError(reply, parseResult.error);
  }

  const result = await request.server.services.registry.delete(parseResult.data.code, currentUserId(request));

  if (!result.success) {
    return sendFailure(reply, result);
  }

  return reply.status(204).send();
}

// ============================================================================
// Route Registration
// ============================================================================

const codeParams = {
  type: "object",
  required: ["code"],
  properties: {
    code: { type: "string", description: "Short code" },
  },
} as const;

export async function linksRoutes(fastify: FastifyInstance): Promise<void> {
  const { rateLimit } = fastify.appConfig;

  fastify.post("/links", {
    preHandler: requireAuth,
    config: {
      rateLimit: { max: rateLimit.createMax, timeWindow: "1 minute" },
    },
    schema: {
      description: "Create a new short link with a generated or custom code",
      tags: ["links"],
      security: [{ bearerAuth: [] }],
    },
    handler: createLinkHandler,
  });

  fastify.get("/links", {
    preHandler: requireAuth,
    schema: {
      description: "List the caller's links, newest first",
      tags: ["links"],
      security: [{ bearerAuth: [] }],
    },
    handler: listLinksHandler,
  });

  // Static segment, matched ahead of /links/:code
  fastify.get("/links/check", {
    schema: {
      description: "Check if a custom code is available",
      tags: ["links"],
    },
    handler: checkCodeHandler,
  });

  fastify.get("/links/:code", {
    preHandler: requireAuth,
    schema: {
      description: "Get a short link",
      tags: ["links"],
      security: [{ bearerAuth: [] }],
      params: codeParams,
    },
    handler: getLinkHandler,
  });

  fastify.get("/links/:code/stats", {
    preHandler: requireAuth,
    schema: {
      description: "Click statistics for an owned link",
      tags: ["links"],
      security: [{ bearerAuth: [] }],
      params: codeParams,
    },
    handler: statsHandler,
  });

  fastify.patch("/links/:code", {
    preHandler: requireAuth,
    schema: {
      description: "Update destination, title or enabled on an owned link",
      tags: ["links"],
      security: [{ bearerAuth: [] }],
      params: codeParams,
    },
    handler: updateLinkHandler,
  });

  fastify.delete("/links/:code", {
    preHandler: requireAuth,
    schema: {
      description: "Delete an owned link and free its code",
      tags: ["links"],
      security: [{ bearerAuth: [] }],
      params: codeParams,
    },
    handler: deleteLinkHandler,
  });
}
