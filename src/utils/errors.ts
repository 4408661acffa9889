export type ErrorCategory =
  | "validation"
  | "precondition"
  | "not_found"
  | "transfer"
  | "authorization"
  | "concurrency"
  | "internal";

export type ErrorCode =
  | "VALIDATION_ERROR"
  | "INVALID_TRANSITION"
  | "ALREADY_PROCESSED"
  | "NOT_ELIGIBLE"
  | "ALREADY_DISBURSED"
  | "NOT_FOUND"
  | "INCOMPLETE_BANK_DETAILS"
  | "TRANSFER_FAILED"
  | "AUTH_FAILED"
  | "FORBIDDEN"
  | "CONFLICT"
  | "RATE_LIMITED"
  | "INTERNAL";

function defaultCode(statusCode: number): ErrorCode {
  if (statusCode === 401) return "AUTH_FAILED";
  if (statusCode === 403) return "FORBIDDEN";
  if (statusCode === 404) return "NOT_FOUND";
  if (statusCode === 409) return "CONFLICT";
  if (statusCode === 422 || statusCode === 400) return "VALIDATION_ERROR";
  if (statusCode === 429) return "RATE_LIMITED";
  return "INTERNAL";
}

const categoryByCode: Record<ErrorCode, ErrorCategory> = {
  VALIDATION_ERROR: "validation",
  INVALID_TRANSITION: "precondition",
  ALREADY_PROCESSED: "precondition",
  NOT_ELIGIBLE: "precondition",
  ALREADY_DISBURSED: "precondition",
  NOT_FOUND: "not_found",
  INCOMPLETE_BANK_DETAILS: "transfer",
  TRANSFER_FAILED: "transfer",
  AUTH_FAILED: "authorization",
  FORBIDDEN: "authorization",
  CONFLICT: "concurrency",
  RATE_LIMITED: "validation",
  INTERNAL: "internal",
};

export class HttpError extends Error {
  readonly statusCode: number;
  readonly details?: unknown;
  readonly code: ErrorCode;

  constructor(statusCode: number, message: string, details?: unknown, code?: ErrorCode) {
    super(message);
    this.name = "HttpError";
    this.statusCode = statusCode;
    this.details = details;
    this.code = code ?? defaultCode(statusCode);
  }

  get category(): ErrorCategory {
    return categoryByCode[this.code];
  }
}

export class ValidationError extends HttpError {
  constructor(message: string, details?: unknown) {
    super(422, message, details, "VALIDATION_ERROR");
    this.name = "ValidationError";
  }
}

export class NotFoundError extends HttpError {
  constructor(entity: string, id: string) {
    super(404, `${entity} not found`, { id }, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}

export class InvalidTransitionError extends HttpError {
  constructor(entityType: string, fromStatus: string, toStatus: string) {
    super(
      409,
      `Invalid ${entityType} transition: ${fromStatus} -> ${toStatus}`,
      { entityType, fromStatus, toStatus },
      "INVALID_TRANSITION",
    );
    this.name = "InvalidTransitionError";
  }
}

export class AlreadyProcessedError extends HttpError {
  constructor(message: string, details?: unknown) {
    super(409, message, details, "ALREADY_PROCESSED");
    this.name = "AlreadyProcessedError";
  }
}

export class NotEligibleError extends HttpError {
  constructor(message: string, details?: unknown) {
    super(409, message, details, "NOT_ELIGIBLE");
    this.name = "NotEligibleError";
  }
}

export class AlreadyDisbursedError extends HttpError {
  constructor(applicationId: string, disbursementId: string) {
    super(
      409,
      "Application already has an active disbursement",
      { applicationId, disbursementId },
      "ALREADY_DISBURSED",
    );
    this.name = "AlreadyDisbursedError";
  }
}

export class IncompleteBankDetailsError extends HttpError {
  constructor(disbursementId: string, missing: string[]) {
    super(
      422,
      `Incomplete bank details: missing ${missing.join(", ")}`,
      { disbursementId, missing },
      "INCOMPLETE_BANK_DETAILS",
    );
    this.name = "IncompleteBankDetailsError";
  }
}

export class TransferFailedError extends HttpError {
  constructor(disbursementId: string, reason: string) {
    super(502, `Transfer failed: ${reason}`, { disbursementId, reason }, "TRANSFER_FAILED");
    this.name = "TransferFailedError";
  }
}

export class ConcurrencyConflictError extends HttpError {
  constructor(entity: string, id: string) {
    super(409, `${entity} was modified concurrently`, { id }, "CONFLICT");
    this.name = "ConcurrencyConflictError";
  }
}
