export class GatewayError extends Error {
  readonly code: string;
  readonly statusCode: number;

  constructor(code: string, message: string, statusCode: number = 500, options?: ErrorOptions) {
    super(message, options);
    this.name = "GatewayError";
    this.code = code;
    this.statusCode = statusCode;
  }

  toJSON() {
    return {
      error: this.code,
      message: this.message,
    };
  }
}

/** Bad region, endpoint or credentials, or a store client that cannot be built. Fatal at start-up. */
export class ConfigurationError extends GatewayError {
  constructor(message: string, options?: ErrorOptions) {
    super("ConfigurationError", message, 500, options);
    this.name = "ConfigurationError";
  }
}

export class ValidationError extends GatewayError {
  constructor(message: string) {
    super("ValidationError", message, 422);
    this.name = "ValidationError";
  }
}

export type BackendOperation =
  | "listObjects"
  | "createMultipartUpload"
  | "completeMultipartUpload"
  | "abortMultipartUpload";

export class BackendOperationError extends GatewayError {
  readonly operation: BackendOperation;
  /** Error name reported by the store, e.g. `NoSuchUpload`. */
  readonly backendCode: string;

  constructor(operation: BackendOperation, cause: unknown) {
    const backendCode = cause instanceof Error ? cause.name : "UnknownError";
    const detail = cause instanceof Error ? cause.message : String(cause);
    super("BackendOperationError", `${operation} failed: ${backendCode}: ${detail}`, 500, {
      cause,
    });
    this.name = "BackendOperationError";
    this.operation = operation;
    this.backendCode = backendCode;
  }
}

/** The store answered with success but left out a field the protocol requires. */
export class ProtocolViolationError extends GatewayError {
  constructor(message: string) {
    super("ProtocolViolation", message, 500);
    this.name = "ProtocolViolationError";
  }
}

export class NotFoundError extends GatewayError {
  constructor(method: string, url: string) {
    super("NotFound", `Route ${method} ${url} not found`, 404);
    this.name = "NotFoundError";
  }
}
