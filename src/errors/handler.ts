import chalk from 'chalk';
import { AppError, ErrorCode } from './types';

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

/**
 * Map Node.js system errors to app errors
 */
export function mapSystemError(error: NodeJS.ErrnoException): AppError {
  switch (error.code) {
    case 'ENOENT':
      return new AppError(
        'File or directory not found',
        ErrorCode.FILE_NOT_FOUND,
        { path: error.path, syscall: error.syscall },
        false
      );

    case 'EACCES':
    case 'EPERM':
      return new AppError(
        'Permission denied',
        ErrorCode.PERMISSION_DENIED,
        { path: error.path, syscall: error.syscall },
        false
      );

    case 'EISDIR':
      return new AppError(
        'Not a file',
        ErrorCode.NOT_A_FILE,
        { path: error.path, syscall: error.syscall },
        false
      );

    default:
      return new AppError(
        error.message || 'System error',
        ErrorCode.UNKNOWN_ERROR,
        { originalCode: error.code, syscall: error.syscall },
        false
      );
  }
}

/**
 * Convert any error to AppError
 */
export function toAppError(error: unknown): AppError {
  // Already an AppError
  if (error instanceof AppError) {
    return error;
  }

  // Node.js system error
  if (isErrnoException(error)) {
    return mapSystemError(error);
  }

  // Generic Error
  if (error instanceof Error) {
    return new AppError(
      error.message,
      ErrorCode.UNKNOWN_ERROR,
      { originalError: error.name },
      false
    );
  }

  // Unknown error type
  return new AppError(
    String(error),
    ErrorCode.UNKNOWN_ERROR,
    {},
    false
  );
}

/**
 * Handle and format error for CLI display
 */
export function handleError(error: unknown, debug: boolean = false): void {
  const appError = toAppError(error);

  console.error(chalk.red.bold('\n✗ Error:'), appError.toUserMessage());

  const suggestion = appError.getRecoverySuggestion();
  if (suggestion) {
    console.error(chalk.yellow('\n💡 Suggestion:'), suggestion);
  }

  if (debug) {
    console.error(chalk.dim('\n📋 Debug Information:'));
    console.error(chalk.dim('  Error Code:'), appError.code);
    console.error(chalk.dim('  Technical Message:'), appError.message);

    if (appError.details && Object.keys(appError.details).length > 0) {
      console.error(chalk.dim('  Details:'));
      console.error(chalk.dim(JSON.stringify(appError.details, null, 4)));
    }

    if (appError.stack) {
      console.error(chalk.dim('\n📚 Stack Trace:'));
      console.error(chalk.dim(appError.stack));
    }
  } else {
    console.error(chalk.dim('\n💻 Run with --debug for detailed error information'));
  }
}
