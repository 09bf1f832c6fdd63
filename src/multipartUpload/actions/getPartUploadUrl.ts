import type { FastifyReply, FastifyRequest } from "fastify";
import { json, redirect } from "../../common/responses.js";
import { ObjectQuerySchema, PartParamsSchema, parseRequest } from "../../common/schemas.js";
import type { GatewayContext } from "../../config/gatewayConfig.js";
import { partUploadUrl } from "../orchestrator.js";

export async function getPartUploadUrl(
  request: FastifyRequest,
  reply: FastifyReply,
  context: GatewayContext,
): Promise<FastifyReply> {
  const { uploadId, partNumber } = parseRequest(PartParamsSchema, request.params);
  const { bucket, path } = parseRequest(ObjectQuerySchema, request.query);

  request.log.info({ bucket, key: path, uploadId, partNumber }, "Signing part upload");
  const presignedUrl = await partUploadUrl(
    context.store,
    { bucket, key: path },
    uploadId,
    partNumber,
    { expiresIn: context.presignExpiresIn },
  );

  if (context.partUrlResponse === "redirect") {
    return redirect(reply, presignedUrl);
  }
  return json(reply, { presignedUrl });
}
