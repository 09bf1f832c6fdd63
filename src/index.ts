export { buildApp, startGateway } from "./app.js";
export type { GatewayOptions, GatewayServer } from "./app.js";
export { createCli, parseCliOptions } from "./cli.js";
export {
  BackendOperationError,
  ConfigurationError,
  GatewayError,
  NotFoundError,
  ProtocolViolationError,
  ValidationError,
} from "./common/errors.js";
export type { BackendOperation } from "./common/errors.js";
export type { CompletedUploadPart, ListingEntry, ObjectRef } from "./common/types.js";
export { resolveGatewayConfig } from "./config/gatewayConfig.js";
export type { GatewayConfig, GatewayContext, RawGatewayOptions } from "./config/gatewayConfig.js";
export { createStoreConfig } from "./config/storeConfig.js";
export type { StoreConfig, StoreConfigInput } from "./config/storeConfig.js";
export {
  abortOrComplete,
  abortUpload,
  completeUpload,
  createUpload,
  partUploadUrl,
} from "./multipartUpload/orchestrator.js";
export { listDirectory, toListingEntries } from "./objects/listing.js";
export { withS3Client } from "./s3/s3Session.js";
export { signObjectUrl } from "./s3/signer.js";
export type { SignOperation, SignOptions } from "./s3/signer.js";
