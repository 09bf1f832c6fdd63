import type { FastifyReply, FastifyRequest } from "fastify";
import { json } from "../../common/responses.js";
import { ObjectQuerySchema, parseRequest } from "../../common/schemas.js";
import type { GatewayContext } from "../../config/gatewayConfig.js";
import { createUpload } from "../orchestrator.js";

export async function createMultipartUpload(
  request: FastifyRequest,
  reply: FastifyReply,
  context: GatewayContext,
): Promise<FastifyReply> {
  const { bucket, path } = parseRequest(ObjectQuerySchema, request.query);

  const uploadId = await createUpload(context.store, { bucket, key: path });
  request.log.info({ bucket, key: path, uploadId }, "Created multipart upload");

  return json(reply, { uploadId });
}
