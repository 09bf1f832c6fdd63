import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { BackendOperationError, GatewayError, NotFoundError } from "./errors.js";

export const CORS_HEADERS = {
  "access-control-allow-origin": "*",
  "access-control-allow-headers": "*",
  "access-control-allow-methods": "GET,POST,PUT,DELETE,PATCH,OPTIONS",
} as const;

export function redirect(reply: FastifyReply, url: string): FastifyReply {
  return reply.redirect(url, 302);
}

export function json(reply: FastifyReply, body: unknown): FastifyReply {
  reply.header("content-type", "application/json; charset=utf-8");
  return reply.status(200).send(body);
}

export function empty(reply: FastifyReply): FastifyReply {
  return reply.status(200).send();
}

function field(source: unknown, key: string): unknown {
  return typeof source === "object" && source !== null ? Reflect.get(source, key) : undefined;
}

function logContext(request: FastifyRequest, err: GatewayError): Record<string, unknown> {
  return {
    err,
    code: err.code,
    operation: err instanceof BackendOperationError ? err.operation : undefined,
    backendCode: err instanceof BackendOperationError ? err.backendCode : undefined,
    bucket: field(request.query, "bucket"),
    key: field(request.query, "path"),
    uploadId: field(request.params, "uploadId"),
  };
}

/**
 * Installs CORS headers on every response and turns thrown errors into
 * `{ error, message }` JSON bodies.
 */
export function registerResponseHandling(app: FastifyInstance): void {
  app.addHook("onSend", async (_request, reply, payload) => {
    reply.headers(CORS_HEADERS);
    return payload;
  });

  app.setNotFoundHandler((request, reply) => {
    const err = new NotFoundError(request.method, request.url);
    request.log.info({ code: err.code }, err.message);
    reply.status(err.statusCode).send(err.toJSON());
  });

  app.setErrorHandler((err: FastifyError, request, reply) => {
    if (err instanceof GatewayError) {
      if (err.statusCode >= 500) {
        request.log.error(logContext(request, err), err.message);
      } else {
        request.log.info(logContext(request, err), err.message);
      }
      reply.status(err.statusCode).send(err.toJSON());
      return;
    }

    // Fastify's own client errors (oversized body, unsupported media type)
    if (err.statusCode !== undefined && err.statusCode < 500) {
      request.log.info({ err }, err.message);
      reply.status(err.statusCode).send({ error: err.code, message: err.message });
      return;
    }

    request.log.error({ err }, "Unhandled error");
    reply.status(500).send({ error: "InternalError", message: "Internal server error" });
  });
}
