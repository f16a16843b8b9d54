/**
 * Error codes for different error scenarios
 */
export enum ErrorCode {
  // Credential store errors
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  NOT_A_FILE = 'NOT_A_FILE',

  // Resolution errors
  NO_CREDENTIAL_FOUND = 'NO_CREDENTIAL_FOUND',
  INVALID_TARGET = 'INVALID_TARGET',

  // Generic
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

/**
 * Custom application error class with error codes and recovery hints
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    public details?: Record<string, unknown>,
    public isRecoverable: boolean = false
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert to user-friendly message
   */
  toUserMessage(): string {
    switch (this.code) {
      case ErrorCode.FILE_NOT_FOUND:
        return `File not found: ${this.details?.path || 'unknown'}`;

      case ErrorCode.PERMISSION_DENIED:
        return `Permission denied: ${this.details?.path || 'unknown'}`;

      case ErrorCode.NOT_A_FILE:
        return `Not a file: ${this.details?.path || 'unknown'}`;

      case ErrorCode.NO_CREDENTIAL_FOUND:
        return `No credentials found for ${this.details?.target || 'target'}`;

      case ErrorCode.INVALID_TARGET:
        return 'A target URL or host is required.';

      default:
        return this.message || 'An unknown error occurred.';
    }
  }

  /**
   * Get recovery suggestion for the error
   */
  getRecoverySuggestion(): string | null {
    switch (this.code) {
      case ErrorCode.FILE_NOT_FOUND:
        return 'Check that the file path is correct';

      case ErrorCode.PERMISSION_DENIED:
        return 'Check file permissions or try running with appropriate privileges';

      case ErrorCode.NO_CREDENTIAL_FOUND:
        return 'Add an entry for the host to ~/.git-credentials or ~/.netrc';

      case ErrorCode.INVALID_TARGET:
        return 'Run: host-auth find <url>';

      default:
        return null;
    }
  }
}
