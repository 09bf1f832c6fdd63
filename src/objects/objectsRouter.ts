import type { FastifyInstance } from "fastify";
import type { GatewayContext } from "../config/gatewayConfig.js";
import { createObjectUrl } from "./actions/createObjectUrl.js";
import { getObjectUrl } from "./actions/getObjectUrl.js";
import { listObjects } from "./actions/listObjects.js";
import { sign } from "./actions/sign.js";

export function registerObjectRoutes(app: FastifyInstance, context: GatewayContext): void {
  // Signed download: GET /object?bucket&path -> 302
  app.get("/object", (request, reply) => getObjectUrl(request, reply, context));

  // Signed upload: POST /objects?bucket&path -> 302
  app.post("/objects", (request, reply) => createObjectUrl(request, reply, context));

  // Directory listing: GET /objects?bucket&prefix
  app.get("/objects", (request, reply) => listObjects(request, reply, context));

  app.get("/sign", (request, reply) => sign(request, reply, context));
}
