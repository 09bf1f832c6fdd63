#!/usr/bin/env node
import { CommanderError } from "commander";
import { buildApp } from "./app.js";
import { parseCliOptions } from "./cli.js";
import { GatewayError } from "./common/errors.js";
import { resolveGatewayConfig } from "./config/gatewayConfig.js";

const start = async () => {
  const config = resolveGatewayConfig(parseCliOptions(process.argv));

  const app = buildApp({
    store: config.store,
    logLevel: config.logLevel,
    apiPrefix: config.apiPrefix,
    presignExpiresIn: config.presignExpiresIn,
    partUrlResponse: config.partUrlResponse,
  });

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      app.log.info({ signal }, "Shutting down");
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          app.log.error({ err }, "Error while shutting down");
          process.exit(1);
        },
      );
    });
  }

  await app.listen({ port: config.port, host: "0.0.0.0" });
  app.log.info(
    { region: config.store.region, endpoint: config.store.endpoint ?? "aws" },
    "Presign gateway ready",
  );
};

start().catch((err: unknown) => {
  if (err instanceof CommanderError) {
    process.exit(err.exitCode);
  }
  const message = err instanceof GatewayError ? `${err.code}: ${err.message}` : String(err);
  console.error(message);
  process.exit(1);
});
