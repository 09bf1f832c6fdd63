import * as v from "valibot";
import { ConfigurationError } from "../common/errors.js";
import { DEFAULT_REGION } from "../common/types.js";

export interface StoreConfig {
  readonly accessKeyId: string;
  readonly secretAccessKey: string;
  /** AWS region, or a custom signing label when `endpoint` is set. */
  readonly region: string;
  readonly endpoint?: string;
  readonly forcePathStyle: boolean;
}

const StoreConfigInputSchema = v.object({
  accessKeyId: v.pipe(v.string(), v.nonEmpty("access key id must not be empty")),
  secretAccessKey: v.pipe(v.string(), v.nonEmpty("secret access key must not be empty")),
  region: v.optional(v.pipe(v.string(), v.nonEmpty("region must not be empty")), DEFAULT_REGION),
  hostname: v.optional(v.string()),
  forcePathStyle: v.optional(v.boolean()),
});

const AWS_REGION_PATTERN = /^[a-z]{2}(-[a-z]+)+-\d+$/;

export type StoreConfigInput = v.InferInput<typeof StoreConfigInputSchema>;

/**
 * Accepts either a full URL or a bare `host[:port]`, which is taken as https.
 */
export function normalizeEndpoint(hostname: string): string {
  const candidate = /^[a-z][a-z0-9+.-]*:\/\//i.test(hostname) ? hostname : `https://${hostname}`;

  let url: URL;
  try {
    url = new URL(candidate);
  } catch (err) {
    throw new ConfigurationError(`Invalid store hostname: ${hostname}`, { cause: err });
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ConfigurationError(
      `Unsupported store endpoint protocol "${url.protocol}" in ${hostname}`,
    );
  }
  // new URL() always leaves a "/" path on bare origins
  return url.href.replace(/\/$/, "");
}

export function createStoreConfig(input: StoreConfigInput): StoreConfig {
  const result = v.safeParse(StoreConfigInputSchema, input);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid store configuration: ${result.issues.map((issue) => issue.message).join("; ")}`,
    );
  }

  const { accessKeyId, secretAccessKey, region, hostname, forcePathStyle } = result.output;
  const endpoint = hostname ? normalizeEndpoint(hostname) : undefined;
  // Without a custom endpoint the region ends up in the s3.<region>.amazonaws.com host name
  if (!endpoint && !AWS_REGION_PATTERN.test(region)) {
    throw new ConfigurationError(`Invalid AWS region: ${region}`);
  }

  return Object.freeze({
    accessKeyId,
    secretAccessKey,
    region,
    endpoint,
    forcePathStyle: forcePathStyle ?? endpoint !== undefined,
  });
}
