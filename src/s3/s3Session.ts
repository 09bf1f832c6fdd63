import { S3Client, type S3ClientConfig } from "@aws-sdk/client-s3";
import { ConfigurationError } from "../common/errors.js";
import type { StoreConfig } from "../config/storeConfig.js";

export function s3ClientConfig(config: StoreConfig): S3ClientConfig {
  return {
    region: config.region,
    endpoint: config.endpoint,
    forcePathStyle: config.forcePathStyle,
    credentials: {
      accessKeyId: config.accessKeyId,
      secretAccessKey: config.secretAccessKey,
    },
    // Retrying is left to the caller: a repeated CompleteMultipartUpload is not safe
    maxAttempts: 1,
    // Presigned PUTs must not carry a checksum of an empty body
    requestChecksumCalculation: "WHEN_REQUIRED",
    responseChecksumValidation: "WHEN_REQUIRED",
  };
}

export function createS3Client(config: StoreConfig): S3Client {
  try {
    return new S3Client(s3ClientConfig(config));
  } catch (err) {
    throw new ConfigurationError("Cannot create S3 client", { cause: err });
  }
}

/**
 * Runs `operation` with a client that belongs to it alone. The client is
 * destroyed once the operation settles, whatever the outcome.
 */
export async function withS3Client<T>(
  config: StoreConfig,
  operation: (client: S3Client) => Promise<T>,
): Promise<T> {
  const client = createS3Client(config);
  try {
    return await operation(client);
  } finally {
    client.destroy();
  }
}
