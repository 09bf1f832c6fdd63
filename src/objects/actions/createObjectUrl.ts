import type { FastifyReply, FastifyRequest } from "fastify";
import { redirect } from "../../common/responses.js";
import { ObjectQuerySchema, parseRequest } from "../../common/schemas.js";
import type { GatewayContext } from "../../config/gatewayConfig.js";
import { signObjectUrl } from "../../s3/signer.js";

export async function createObjectUrl(
  request: FastifyRequest,
  reply: FastifyReply,
  context: GatewayContext,
): Promise<FastifyReply> {
  const { bucket, path } = parseRequest(ObjectQuerySchema, request.query);

  const url = await signObjectUrl(
    context.store,
    { kind: "put" },
    { bucket, key: path },
    { expiresIn: context.presignExpiresIn },
  );

  return redirect(reply, url);
}
