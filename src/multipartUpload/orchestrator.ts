import {
  AbortMultipartUploadCommand,
  CompleteMultipartUploadCommand,
  CreateMultipartUploadCommand,
  type CompletedPart,
} from "@aws-sdk/client-s3";
import { BackendOperationError, ProtocolViolationError } from "../common/errors.js";
import type { AbortOrCompleteBody } from "../common/schemas.js";
import type { CompletedUploadPart, ObjectRef } from "../common/types.js";
import type { StoreConfig } from "../config/storeConfig.js";
import { withS3Client } from "../s3/s3Session.js";
import { signObjectUrl, type SignOptions } from "../s3/signer.js";

// Nothing here remembers an upload. The upload id and the part ETags travel
// with every call, and the store alone decides whether a transition is legal.

export async function createUpload(config: StoreConfig, ref: ObjectRef): Promise<string> {
  const output = await withS3Client(config, (client) =>
    client
      .send(new CreateMultipartUploadCommand({ Bucket: ref.bucket, Key: ref.key }))
      .catch((err: unknown) => {
        throw new BackendOperationError("createMultipartUpload", err);
      }),
  );

  if (!output.UploadId) {
    throw new ProtocolViolationError(
      `Store accepted multipart upload creation for ${ref.bucket}/${ref.key} but returned no UploadId`,
    );
  }
  return output.UploadId;
}

export function partUploadUrl(
  config: StoreConfig,
  ref: ObjectRef,
  uploadId: string,
  partNumber: number,
  options?: SignOptions,
): Promise<string> {
  return signObjectUrl(config, { kind: "uploadPart", uploadId, partNumber }, ref, options);
}

export function toCompletedParts(parts: readonly CompletedUploadPart[]): CompletedPart[] {
  return parts.map((part) => ({ PartNumber: part.number, ETag: part.etag }));
}

/**
 * Forwards the caller's part list as given, empty or not. Ordering and ETag
 * checks belong to the store.
 */
export async function completeUpload(
  config: StoreConfig,
  ref: ObjectRef,
  uploadId: string,
  parts: readonly CompletedUploadPart[],
): Promise<void> {
  await withS3Client(config, (client) =>
    client
      .send(
        new CompleteMultipartUploadCommand({
          Bucket: ref.bucket,
          Key: ref.key,
          UploadId: uploadId,
          MultipartUpload: { Parts: toCompletedParts(parts) },
        }),
      )
      .catch((err: unknown) => {
        throw new BackendOperationError("completeMultipartUpload", err);
      }),
  );
}

export async function abortUpload(
  config: StoreConfig,
  ref: ObjectRef,
  uploadId: string,
): Promise<void> {
  await withS3Client(config, (client) =>
    client
      .send(
        new AbortMultipartUploadCommand({ Bucket: ref.bucket, Key: ref.key, UploadId: uploadId }),
      )
      .catch((err: unknown) => {
        throw new BackendOperationError("abortMultipartUpload", err);
      }),
  );
}

export function abortOrComplete(
  config: StoreConfig,
  ref: ObjectRef,
  uploadId: string,
  body: AbortOrCompleteBody,
): Promise<void> {
  switch (body.action) {
    case "Abort":
      return abortUpload(config, ref, uploadId);
    case "Complete":
      return completeUpload(config, ref, uploadId, body.parts);
  }
}
