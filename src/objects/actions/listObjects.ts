import type { FastifyReply, FastifyRequest } from "fastify";
import { json } from "../../common/responses.js";
import { ListObjectsQuerySchema, parseRequest } from "../../common/schemas.js";
import type { GatewayContext } from "../../config/gatewayConfig.js";
import { listDirectory } from "../listing.js";

export async function listObjects(
  request: FastifyRequest,
  reply: FastifyReply,
  context: GatewayContext,
): Promise<FastifyReply> {
  const { bucket, prefix } = parseRequest(ListObjectsQuerySchema, request.query);

  const entries = await listDirectory(context.store, bucket, prefix);
  request.log.debug({ bucket, prefix, count: entries.length }, "Listed objects");

  return json(reply, entries);
}
