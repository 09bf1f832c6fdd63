import Fastify from "fastify";
import { ConfigurationError, ValidationError } from "./common/errors.js";
import { registerResponseHandling } from "./common/responses.js";
import {
  DEFAULT_API_PREFIX,
  DEFAULT_PORT,
  DEFAULT_PRESIGN_EXPIRES_IN,
  MAX_PRESIGN_EXPIRES_IN,
  type LogLevel,
  type PartUrlResponseMode,
} from "./common/types.js";
import { packageInfo } from "./common/version.js";
import type { GatewayContext } from "./config/gatewayConfig.js";
import type { StoreConfig } from "./config/storeConfig.js";
import { registerMultipartUploadRoutes } from "./multipartUpload/multipartUploadRouter.js";
import { registerObjectRoutes } from "./objects/objectsRouter.js";

export interface GatewayOptions {
  store: StoreConfig;
  logger?: boolean;
  logLevel?: LogLevel;
  /** Path prefix of the API routes. `/` and OPTIONS always live at the root. */
  apiPrefix?: string;
  presignExpiresIn?: number;
  partUrlResponse?: PartUrlResponseMode;
}

function checkPresignExpiresIn(expiresIn: number): number {
  if (!Number.isInteger(expiresIn) || expiresIn < 1 || expiresIn > MAX_PRESIGN_EXPIRES_IN) {
    throw new ConfigurationError(
      `presignExpiresIn must be an integer between 1 and ${MAX_PRESIGN_EXPIRES_IN}, got ${expiresIn}`,
    );
  }
  return expiresIn;
}

export function buildApp(options: GatewayOptions) {
  const presignExpiresIn = checkPresignExpiresIn(
    options.presignExpiresIn ?? DEFAULT_PRESIGN_EXPIRES_IN,
  );

  const app = Fastify({
    logger: (options.logger ?? true) ? { level: options.logLevel ?? "info" } : false,
    forceCloseConnections: true,
  });

  const context: GatewayContext = {
    store: options.store,
    presignExpiresIn,
    partUrlResponse: options.partUrlResponse ?? "json",
  };

  // Malformed JSON is a bad parameter like any other: answered with 422
  app.removeContentTypeParser("application/json");
  app.addContentTypeParser(
    "application/json",
    { parseAs: "string" },
    (_req, body, done) => {
      const text = String(body);
      if (text.trim() === "") {
        done(null, undefined);
        return;
      }
      let parsed: unknown;
      try {
        parsed = JSON.parse(text);
      } catch {
        done(new ValidationError("Request body is not valid JSON"), undefined);
        return;
      }
      done(null, parsed);
    },
  );

  // Anything else is kept as text and left to the route's body schema
  app.addContentTypeParser("*", { parseAs: "string" }, (_req, body, done) => {
    done(null, body);
  });

  registerResponseHandling(app);

  app.get("/", async (_request, reply) => {
    const { name, version } = packageInfo();
    reply.header("content-type", "text/plain; charset=utf-8");
    return `${name} (version ${version})\n`;
  });

  app.options("*", async (_request, reply) => reply.status(200).send());

  void app.register(
    async (api) => {
      registerObjectRoutes(api, context);
      registerMultipartUploadRoutes(api, context);
    },
    { prefix: options.apiPrefix ?? DEFAULT_API_PREFIX },
  );

  return app;
}

export interface GatewayServer {
  readonly port: number;
  readonly address: string;
  stop(): Promise<void>;
}

export async function startGateway(
  options: GatewayOptions & { port?: number; host?: string },
): Promise<GatewayServer> {
  const app = buildApp(options);
  const listenAddress = await app.listen({
    port: options.port ?? DEFAULT_PORT,
    host: options.host ?? "0.0.0.0",
  });
  const url = new URL(listenAddress);

  return {
    get port() {
      return parseInt(url.port);
    },
    get address() {
      return listenAddress;
    },
    stop() {
      return app.close();
    },
  };
}
