import * as v from "valibot";
import { ConfigurationError } from "../common/errors.js";
import {
  DEFAULT_API_PREFIX,
  DEFAULT_PORT,
  DEFAULT_PRESIGN_EXPIRES_IN,
  MAX_PRESIGN_EXPIRES_IN,
  logLevelFromVerbosity,
  type LogLevel,
  type PartUrlResponseMode,
} from "../common/types.js";
import { createStoreConfig, type StoreConfig } from "./storeConfig.js";

/** What every route handler gets to see. Read-only and shared by all requests. */
export interface GatewayContext {
  readonly store: StoreConfig;
  readonly presignExpiresIn: number;
  readonly partUrlResponse: PartUrlResponseMode;
}

export interface GatewayConfig extends GatewayContext {
  readonly port: number;
  readonly apiPrefix: string;
  readonly logLevel: LogLevel;
}

const IntegerString = (name: string, min: number, max: number) =>
  v.pipe(
    v.string(),
    v.regex(/^\d+$/, `${name} must be an integer`),
    v.transform(Number),
    v.minValue(min, `${name} must be at least ${min}`),
    v.maxValue(max, `${name} must be at most ${max}`),
  );

const RawOptionsSchema = v.object({
  awsAccessKeyId: v.string("AWS access key id is required"),
  awsSecretAccessKey: v.string("AWS secret access key is required"),
  awsRegion: v.optional(v.string()),
  awsHostname: v.optional(v.string()),
  port: v.optional(IntegerString("port", 0, 65_535), String(DEFAULT_PORT)),
  verbose: v.optional(v.pipe(v.number(), v.integer(), v.minValue(0)), 0),
  apiPrefix: v.optional(
    v.pipe(v.string(), v.regex(/^(\/[^/\s]+)*$/, 'apiPrefix must look like "/api" or be empty')),
    DEFAULT_API_PREFIX,
  ),
  presignExpiresIn: v.optional(
    IntegerString("presignExpiresIn", 1, MAX_PRESIGN_EXPIRES_IN),
    String(DEFAULT_PRESIGN_EXPIRES_IN),
  ),
  partUrlResponse: v.optional(
    v.picklist(["json", "redirect"], 'partUrlResponse must be "json" or "redirect"'),
    "json",
  ),
});

export type RawGatewayOptions = v.InferInput<typeof RawOptionsSchema>;

/**
 * Validates the raw command-line/environment options and builds the
 * process-wide configuration.
 */
export function resolveGatewayConfig(raw: RawGatewayOptions): GatewayConfig {
  const result = v.safeParse(RawOptionsSchema, raw);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid options: ${result.issues.map((issue) => issue.message).join("; ")}`,
    );
  }
  const options = result.output;

  return {
    store: createStoreConfig({
      accessKeyId: options.awsAccessKeyId,
      secretAccessKey: options.awsSecretAccessKey,
      region: options.awsRegion,
      hostname: options.awsHostname,
    }),
    port: options.port,
    apiPrefix: options.apiPrefix,
    logLevel: logLevelFromVerbosity(options.verbose),
    presignExpiresIn: options.presignExpiresIn,
    partUrlResponse: options.partUrlResponse,
  };
}
