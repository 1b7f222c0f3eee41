import type { ProviderErrorKind } from "@/types/search";

export class AppError extends Error {
  constructor(
    message: string,
    public readonly options: {
      code?: string;
      status?: number;
      cause?: unknown;
    } = {}
  ) {
    super(message);
    this.name = "AppError";
  }
}

export class ProviderError extends AppError {
  constructor(
    public readonly kind: ProviderErrorKind,
    public readonly provider: string,
    message: string,
    options: { status?: number; cause?: unknown } = {}
  ) {
    super(message, { code: `provider_${kind}`, ...options });
    this.name = "ProviderError";
  }

  get status(): number | undefined {
    return this.options.status;
  }
}

/**
 * Raised when a configuration snapshot cannot be keyed by provider name.
 */
export class ProviderConfigError extends AppError {
  constructor(
    message: string,
    public readonly problems: string[]
  ) {
    super(message, { code: "invalid_provider_config", status: 400 });
    this.name = "ProviderConfigError";
  }
}

export class DuplicateProviderError extends AppError {
  constructor(name: string) {
    super(`A provider named "${name}" already exists`, { code: "duplicate_provider", status: 409 });
    this.name = "DuplicateProviderError";
  }
}

export class ProviderNotFoundError extends AppError {
  constructor(id: string) {
    super(`Provider ${id} was not found`, { code: "provider_not_found", status: 404 });
    this.name = "ProviderNotFoundError";
  }
}

export function describeProviderError(error: ProviderError): string {
  switch (error.kind) {
    case "http_status":
      return error.status !== undefined ? `HTTP ${error.status}` : error.message;
    case "timeout":
    case "network":
    case "invalid_json":
    case "invalid_shape":
    case "invalid_config":
    case "cancelled":
      return error.message;
  }
}
