import type { FastifyReply, FastifyRequest } from "fastify";
import { json } from "../../common/responses.js";
import { SignQuerySchema, parseRequest } from "../../common/schemas.js";
import type { GatewayContext } from "../../config/gatewayConfig.js";
import { signObjectUrl } from "../../s3/signer.js";
import { listDirectory } from "../listing.js";

/**
 * Single-endpoint form kept for older clients: `list=true` lists the
 * directory named by `path`, `create=true` signs an upload, anything else
 * signs a download. Answers with JSON instead of redirecting.
 */
export async function sign(
  request: FastifyRequest,
  reply: FastifyReply,
  context: GatewayContext,
): Promise<FastifyReply> {
  const { bucket, path, list, create } = parseRequest(SignQuerySchema, request.query);

  if (list) {
    return json(reply, await listDirectory(context.store, bucket, path));
  }

  const url = await signObjectUrl(
    context.store,
    create ? { kind: "put" } : { kind: "get" },
    { bucket, key: path },
    { expiresIn: context.presignExpiresIn },
  );
  return json(reply, { url });
}
