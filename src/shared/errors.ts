export type EmbeddingErrorKind = "ProviderUnavailable" | "RateLimited";

export class EmbeddingProviderError extends Error {
  readonly kind: EmbeddingErrorKind;
  readonly status?: number;

  constructor(kind: EmbeddingErrorKind, message: string, status?: number) {
    super(message);
    this.name = "EmbeddingProviderError";
    this.kind = kind;
    this.status = status;
  }
}

export class ValidationError extends Error {
  readonly kind = "ValidationError" as const;
  readonly field: string;
  readonly candidateName?: string;

  constructor(field: string, message: string, candidateName?: string) {
    super(message);
    this.name = "ValidationError";
    this.field = field;
    this.candidateName = candidateName;
  }

  forCandidate(candidateName: string): ValidationError {
    return new ValidationError(this.field, this.message, candidateName);
  }
}

export class ConfigurationError extends Error {
  readonly kind = "ConfigurationError" as const;

  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class StandardizationError extends Error {
  readonly kind = "StandardizationError" as const;
  readonly errorCode: string;

  constructor(errorCode: string, message: string) {
    super(message);
    this.name = "StandardizationError";
    this.errorCode = errorCode;
  }
}

export class DocumentError extends Error {
  readonly kind = "DocumentError" as const;

  constructor(message: string) {
    super(message);
    this.name = "DocumentError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
