import type { FastifyError, FastifyInstance } from "fastify";
import { ZodError } from "zod";
import { DegenerateResultError, InvalidInputError } from "@wprank/engine-core";
import { createApiError, InputParseError } from "@wprank/shared";

interface MappedError {
  status: number;
  code: string;
  message: string;
  details?: unknown;
}

/** Map a thrown error to an HTTP status and API error code, or null for unexpected errors. */
export function mapError(error: unknown): MappedError | null {
  if (error instanceof InvalidInputError) {
    return { status: 400, code: error.code, message: error.message, details: error.detail };
  }
  if (error instanceof InputParseError) {
    return { status: 400, code: "VALIDATION_ERROR", message: error.message, details: error.details };
  }
  if (error instanceof ZodError) {
    return {
      status: 400,
      code: "VALIDATION_ERROR",
      message: "Invalid request body",
      details: error.flatten(),
    };
  }
  if (error instanceof DegenerateResultError) {
    return { status: 422, code: error.code, message: error.message, details: error.detail };
  }
  return null;
}

export function registerErrorHandler(app: FastifyInstance) {
  app.setErrorHandler((error: FastifyError, request, reply) => {
    const mapped = mapError(error);
    if (mapped) {
      request.log.warn({ code: mapped.code, details: mapped.details }, mapped.message);
      return reply
        .status(mapped.status)
        .send(createApiError(mapped.code, mapped.message, mapped.details));
    }

    // Fastify's own client errors (bad JSON, wrong content type) carry a 4xx statusCode.
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply
        .status(error.statusCode)
        .send(createApiError(error.code, error.message));
    }

    request.log.error({ err: error }, "unhandled error");
    return reply.status(500).send(createApiError("INTERNAL_ERROR", "Internal server error"));
  });
}
