/**
 * Error types for the registry scanner.
 * @module errors
 */

/**
 * Error kinds for categorizing scanner errors.
 */
export enum ScannerErrorKind {
  // Configuration errors
  InvalidConfiguration = 'invalid_configuration',

  // Authentication errors
  CredentialsNotFound = 'credentials_not_found',
  TokenExpired = 'token_expired',
  TokenRefreshFailed = 'token_refresh_failed',
  ServiceAccountInvalid = 'service_account_invalid',

  // Authorization errors
  PermissionDenied = 'permission_denied',

  // Discovery errors
  MalformedReference = 'malformed_reference',
  ListingFailed = 'listing_failed',
  NotFound = 'not_found',

  // Scan errors
  AnalysisFailed = 'analysis_failed',
  ExportFailed = 'export_failed',
  PartialFailure = 'partial_failure',
  Cancelled = 'cancelled',

  // Quota errors
  RequestsExceeded = 'requests_exceeded',

  // Network errors
  ConnectionFailed = 'connection_failed',
  Timeout = 'timeout',

  // Server errors
  InternalError = 'internal_error',
  ServiceUnavailable = 'service_unavailable',

  // Generic
  Unknown = 'unknown',
}

/**
 * Options accepted by every ScannerError.
 */
export interface ScannerErrorOptions {
  statusCode?: number;
  requestId?: string;
  cause?: Error;
  details?: Record<string, unknown>;
}

/**
 * Base error class for scanner errors.
 */
export class ScannerError extends Error {
  /** Error kind */
  public readonly kind: ScannerErrorKind;
  /** HTTP status code */
  public readonly statusCode?: number;
  /** GCP request ID */
  public readonly requestId?: string;
  /** Underlying cause */
  public readonly cause?: Error;
  /** Additional details */
  public readonly details?: Record<string, unknown>;

  constructor(kind: ScannerErrorKind, message: string, options?: ScannerErrorOptions) {
    super(message);
    this.name = 'ScannerError';
    this.kind = kind;
    this.statusCode = options?.statusCode;
    this.requestId = options?.requestId;
    this.cause = options?.cause;
    this.details = options?.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ScannerError);
    }
  }

  /**
   * Creates an error from an HTTP status code.
   */
  static fromHttpStatus(
    status: number,
    message: string,
    options?: { requestId?: string }
  ): ScannerError {
    return new ScannerError(ScannerError.kindFromStatus(status), message, {
      statusCode: status,
      requestId: options?.requestId,
    });
  }

  /**
   * Maps HTTP status code to error kind.
   */
  private static kindFromStatus(status: number): ScannerErrorKind {
    switch (status) {
      case 400:
        return ScannerErrorKind.InvalidConfiguration;
      case 401:
        return ScannerErrorKind.TokenExpired;
      case 403:
        return ScannerErrorKind.PermissionDenied;
      case 404:
        return ScannerErrorKind.NotFound;
      case 429:
        return ScannerErrorKind.RequestsExceeded;
      case 500:
        return ScannerErrorKind.InternalError;
      case 503:
        return ScannerErrorKind.ServiceUnavailable;
      default:
        return ScannerErrorKind.Unknown;
    }
  }

  // Convenience factory methods

  static configuration(message: string): ScannerError {
    return new ScannerError(ScannerErrorKind.InvalidConfiguration, message);
  }

  static malformedReference(uri: string, reason: string): ScannerError {
    return new ScannerError(
      ScannerErrorKind.MalformedReference,
      `Invalid image reference ${uri}: ${reason}`,
      { details: { uri } }
    );
  }

  static listingFailed(resource: string, cause: unknown): ScannerError {
    return new ScannerError(
      ScannerErrorKind.ListingFailed,
      `Failed to list ${resource}: ${describeError(cause)}`,
      { cause: toError(cause), details: { resource } }
    );
  }

  static analysisFailed(uri: string, cause: unknown): ScannerError {
    return new ScannerError(
      ScannerErrorKind.AnalysisFailed,
      `Failed to analyze ${uri}: ${describeError(cause)}`,
      { cause: toError(cause), details: { uri } }
    );
  }

  static exportFailed(cause: unknown): ScannerError {
    return new ScannerError(
      ScannerErrorKind.ExportFailed,
      `Failed to export results: ${describeError(cause)}`,
      { cause: toError(cause) }
    );
  }

  static notFound(resource: string): ScannerError {
    return new ScannerError(ScannerErrorKind.NotFound, `Not found: ${resource}`, {
      statusCode: 404,
      details: { resource },
    });
  }

  static invalidResponse(resource: string, detail: string): ScannerError {
    return new ScannerError(
      ScannerErrorKind.Unknown,
      `Unexpected response for ${resource}: ${detail}`,
      { details: { resource } }
    );
  }

  static cancelled(message: string = 'Operation cancelled'): ScannerError {
    return new ScannerError(ScannerErrorKind.Cancelled, message);
  }

  static timeout(message: string): ScannerError {
    return new ScannerError(ScannerErrorKind.Timeout, message);
  }

  /**
   * Formats the error for display.
   */
  toString(): string {
    let result = `[${this.kind}] ${this.message}`;
    if (this.statusCode) {
      result += ` (HTTP ${this.statusCode})`;
    }
    if (this.requestId) {
      result += ` [request_id: ${this.requestId}]`;
    }
    return result;
  }
}

/**
 * Joined error reported when a scan finished but some units failed.
 */
export class ScanAggregateError extends ScannerError {
  /** Every failure recorded during the scan */
  public readonly errors: readonly ScannerError[];

  constructor(errors: readonly ScannerError[]) {
    super(
      ScannerErrorKind.PartialFailure,
      `scan completed with partial errors:\n${errors.map((e) => e.message).join('\n')}`,
      { details: { errorCount: errors.length } }
    );
    this.name = 'ScanAggregateError';
    this.errors = errors;
  }
}

/**
 * Type guard for ScannerError.
 */
export function isScannerError(error: unknown): error is ScannerError {
  return error instanceof ScannerError;
}

/**
 * Checks if an error is a cancellation.
 */
export function isCancelledError(error: unknown): boolean {
  return isScannerError(error) && error.kind === ScannerErrorKind.Cancelled;
}

/**
 * Checks if an error is an authentication error.
 */
export function isAuthError(error: ScannerError): boolean {
  return [
    ScannerErrorKind.CredentialsNotFound,
    ScannerErrorKind.TokenExpired,
    ScannerErrorKind.TokenRefreshFailed,
    ScannerErrorKind.ServiceAccountInvalid,
  ].includes(error.kind);
}

function toError(value: unknown): Error | undefined {
  return value instanceof Error ? value : undefined;
}

function describeError(value: unknown): string {
  return value instanceof Error ? value.message : String(value);
}
