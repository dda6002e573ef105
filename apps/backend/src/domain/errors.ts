export type ErrorKind =
  | "INVALID_IMAGE"
  | "EMPTY_IMAGE"
  | "EMPTY_CATALOG"
  | "CATALOG_UNAVAILABLE"
  | "DUPLICATE_JOB"
  | "NOT_FOUND"
  | "INVALID_TRANSITION"
  | "DIMENSION_MISMATCH"
  | "TIMEOUT"
  | "OCR_UNAVAILABLE"
  | "INVALID_REQUEST"
  | "SHUTTING_DOWN"
  | "INTERNAL";

// Error types for recognition operations
export class RecognitionError extends Error {
  constructor(
    message: string,
    public readonly kind: ErrorKind,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "RecognitionError";
  }
}

export class InvalidImageError extends RecognitionError {
  constructor(message = "Image bytes could not be decoded", options?: ErrorOptions) {
    super(message, "INVALID_IMAGE", options);
    this.name = "InvalidImageError";
  }
}

export class EmptyImageError extends RecognitionError {
  constructor(public readonly width: number, public readonly height: number) {
    super(`Image has degenerate dimensions ${width}x${height}`, "EMPTY_IMAGE");
    this.name = "EmptyImageError";
  }
}

export class EmptyCatalogError extends RecognitionError {
  constructor(message = "Catalog snapshot has no entries") {
    super(message, "EMPTY_CATALOG");
    this.name = "EmptyCatalogError";
  }
}

export class CatalogUnavailableError extends RecognitionError {
  constructor(message = "Catalog has not been loaded", options?: ErrorOptions) {
    super(message, "CATALOG_UNAVAILABLE", options);
    this.name = "CatalogUnavailableError";
  }
}

export class DuplicateJobError extends RecognitionError {
  constructor(public readonly requestId: string) {
    super(`A recognition job is already active for request ${requestId}`, "DUPLICATE_JOB");
    this.name = "DuplicateJobError";
  }
}

export class NotFoundError extends RecognitionError {
  constructor(public readonly requestId: string) {
    super(`No recognition job for request ${requestId}`, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}

/** Coordinator misuse. Indicates a bug in the caller, never a user error. */
export class InvalidTransitionError extends RecognitionError {
  constructor(message: string) {
    super(message, "INVALID_TRANSITION");
    this.name = "InvalidTransitionError";
  }
}

export class DimensionMismatchError extends RecognitionError {
  constructor(public readonly expected: number, public readonly actual: number) {
    super(`Feature vector dimension ${actual} does not match catalog dimension ${expected}`, "DIMENSION_MISMATCH");
    this.name = "DimensionMismatchError";
  }
}

export class TimeoutError extends RecognitionError {
  constructor(public readonly maxDurationMs: number) {
    super(`Recognition exceeded the ${maxDurationMs}ms limit`, "TIMEOUT");
    this.name = "TimeoutError";
  }
}

export class OCRUnavailableError extends RecognitionError {
  constructor(message = "Text recognition engine is unavailable", options?: ErrorOptions) {
    super(message, "OCR_UNAVAILABLE", options);
    this.name = "OCRUnavailableError";
  }
}

export class InvalidRequestError extends RecognitionError {
  constructor(message: string) {
    super(message, "INVALID_REQUEST");
    this.name = "InvalidRequestError";
  }
}

export class ShuttingDownError extends RecognitionError {
  constructor() {
    super("Server is shutting down", "SHUTTING_DOWN");
    this.name = "ShuttingDownError";
  }
}

export const toErrorPayload = (error: unknown): { kind: ErrorKind; message: string } => {
  if (error instanceof RecognitionError) {
    return { kind: error.kind, message: error.message };
  }
  return { kind: "INTERNAL", message: error instanceof Error ? error.message : String(error) };
};
