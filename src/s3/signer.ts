import {
  GetObjectCommand,
  PutObjectCommand,
  UploadPartCommand,
  type S3Client,
} from "@aws-sdk/client-s3";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";
import { ValidationError } from "../common/errors.js";
import { DEFAULT_PRESIGN_EXPIRES_IN, type ObjectRef } from "../common/types.js";
import type { StoreConfig } from "../config/storeConfig.js";
import { withS3Client } from "./s3Session.js";

export type SignOperation =
  | { kind: "get" }
  | { kind: "put" }
  | { kind: "uploadPart"; uploadId: string; partNumber: number };

export interface SignOptions {
  /** Validity of the URL in seconds, counted from the call. */
  expiresIn?: number;
}

function assertSignable(ref: ObjectRef, operation: SignOperation): void {
  if (!ref.bucket) {
    throw new ValidationError("bucket must not be empty");
  }
  if (!ref.key) {
    throw new ValidationError("object key must not be empty");
  }
  if (operation.kind === "uploadPart") {
    if (!operation.uploadId) {
      throw new ValidationError("uploadId must not be empty");
    }
    if (!Number.isInteger(operation.partNumber) || operation.partNumber < 1) {
      throw new ValidationError(
        `partNumber must be an integer greater than or equal to 1, got ${operation.partNumber}`,
      );
    }
  }
}

function presign(
  client: S3Client,
  ref: ObjectRef,
  operation: SignOperation,
  expiresIn: number,
): Promise<string> {
  switch (operation.kind) {
    case "get":
      return getSignedUrl(client, new GetObjectCommand({ Bucket: ref.bucket, Key: ref.key }), {
        expiresIn,
      });
    case "put":
      return getSignedUrl(client, new PutObjectCommand({ Bucket: ref.bucket, Key: ref.key }), {
        expiresIn,
      });
    case "uploadPart":
      return getSignedUrl(
        client,
        new UploadPartCommand({
          Bucket: ref.bucket,
          Key: ref.key,
          UploadId: operation.uploadId,
          PartNumber: operation.partNumber,
        }),
        { expiresIn },
      );
  }
}

/**
 * Returns a SigV4 query-signed URL for a single object operation. Signing is
 * local: no request reaches the store.
 */
export async function signObjectUrl(
  config: StoreConfig,
  operation: SignOperation,
  ref: ObjectRef,
  options?: SignOptions,
): Promise<string> {
  assertSignable(ref, operation);
  const expiresIn = options?.expiresIn ?? DEFAULT_PRESIGN_EXPIRES_IN;

  return withS3Client(config, (client) => presign(client, ref, operation, expiresIn));
}
