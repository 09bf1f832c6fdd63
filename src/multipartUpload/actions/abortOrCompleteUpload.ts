import type { FastifyReply, FastifyRequest } from "fastify";
import { empty } from "../../common/responses.js";
import {
  AbortOrCompleteBodySchema,
  ObjectQuerySchema,
  UploadIdParamsSchema,
  parseRequest,
} from "../../common/schemas.js";
import type { GatewayContext } from "../../config/gatewayConfig.js";
import { abortOrComplete } from "../orchestrator.js";

export async function abortOrCompleteUpload(
  request: FastifyRequest,
  reply: FastifyReply,
  context: GatewayContext,
): Promise<FastifyReply> {
  const { uploadId } = parseRequest(UploadIdParamsSchema, request.params);
  const { bucket, path } = parseRequest(ObjectQuerySchema, request.query);
  const body = parseRequest(AbortOrCompleteBodySchema, request.body);

  request.log.info(
    {
      bucket,
      key: path,
      uploadId,
      action: body.action,
      parts: body.action === "Complete" ? body.parts.length : undefined,
    },
    "Finishing multipart upload",
  );
  await abortOrComplete(context.store, { bucket, key: path }, uploadId, body);

  return empty(reply);
}
