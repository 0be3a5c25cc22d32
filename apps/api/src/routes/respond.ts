/**
 * Response helpers shared by the route modules
 */

import type { FastifyReply } from "fastify";
import type { ZodError } from "zod";
import type { Link } from "@shortlane/db";
import { ERROR_STATUS, type ServiceFailure } from "../services/index.js";

export interface LinkResponse {
  code: string;
  shortUrl: string;
  destination: string;
  title: string | null;
  enabled: boolean;
  clickCount: number;
  lastClickedAt: string | null;
  ownerId: string;
  createdAt: string;
  updatedAt: string;
}

export function toLinkResponse(link: Link, shortUrlBase: string): LinkResponse {
  return {
    code: link.code,
    shortUrl: `${shortUrlBase}/${link.code}`,
    destination: link.destination,
    title: link.title,
    enabled: link.enabled,
    clickCount: link.clickCount,
    lastClickedAt: link.lastClickedAt?.toISOString() ?? null,
    ownerId: link.ownerId,
    createdAt: link.createdAt.toISOString(),
    updatedAt: link.updatedAt.toISOString(),
  };
}

/**
 * Send a service failure with its mapped status
 */
export function sendFailure(reply: FastifyReply, failure: ServiceFailure): FastifyReply {
  return reply.status(ERROR_STATUS[failure.errorCode]).send({
    success: false,
    error: failure.error,
    errorCode: failure.errorCode,
  });
}

/**
 * 400 for a request that failed its zod schema
 */
export function sendValidationError(reply: FastifyReply, error: ZodError): FastifyReply {
  return reply.status(400).send({
    success: false,
    error: "Validation failed",
    errorCode: "VALIDATION_FAILED",
    details: error.flatten(),
  });
}
