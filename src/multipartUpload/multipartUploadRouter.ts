import type { FastifyInstance } from "fastify";
import type { GatewayContext } from "../config/gatewayConfig.js";
import { abortOrCompleteUpload } from "./actions/abortOrCompleteUpload.js";
import { createMultipartUpload } from "./actions/createMultipartUpload.js";
import { getPartUploadUrl } from "./actions/getPartUploadUrl.js";

export function registerMultipartUploadRoutes(app: FastifyInstance, context: GatewayContext): void {
  // CreateMultipartUpload: POST /multipart-upload?bucket&path
  app.post("/multipart-upload", (request, reply) =>
    createMultipartUpload(request, reply, context),
  );

  // Part URL: GET /multipart-upload/:uploadId/part/:partNumber?bucket&path
  app.get("/multipart-upload/:uploadId/part/:partNumber", (request, reply) =>
    getPartUploadUrl(request, reply, context),
  );

  // Abort or complete: POST /multipart-upload/:uploadId?bucket&path with {action}
  app.post("/multipart-upload/:uploadId", (request, reply) =>
    abortOrCompleteUpload(request, reply, context),
  );
}
