// Error taxonomy and per-item error handling for sweep operations

import { Logger } from '../types';

export enum ErrorCategory {
  NOT_FOUND = 'not_found',
  PERMISSION = 'permission',
  BUSY = 'busy',
  NOT_EMPTY = 'not_empty',
  CROSS_DEVICE = 'cross_device',
  FILE_SYSTEM = 'file_system',
  CONFIGURATION = 'configuration',
  UNKNOWN = 'unknown',
}

/**
 * Raised before any filesystem mutation when the operator's options cannot be honoured
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class NotADirectoryError extends ConfigurationError {
  readonly directoryPath: string;

  constructor(directoryPath: string, reason?: string) {
    super(
      `Provided search location '${directoryPath}' is not a valid directory${reason ? ` (${reason})` : ''}`
    );
    this.name = 'NotADirectoryError';
    this.directoryPath = directoryPath;
  }
}

export interface ErrorContext {
  operation: string;
  filePath?: string;
  timestamp: Date;
}

export interface CategorizedError {
  category: ErrorCategory;
  code?: string;
  message: string;
  context: ErrorContext;
}

export type ErrorStatistics = {
  totalErrors: number;
  errorsByCategory: Record<ErrorCategory, number>;
};

const CODE_CATEGORIES: Record<string, ErrorCategory> = {
  ENOENT: ErrorCategory.NOT_FOUND,
  ENOTDIR: ErrorCategory.FILE_SYSTEM,
  EACCES: ErrorCategory.PERMISSION,
  EPERM: ErrorCategory.PERMISSION,
  EROFS: ErrorCategory.PERMISSION,
  EBUSY: ErrorCategory.BUSY,
  EMFILE: ErrorCategory.BUSY,
  ENOTEMPTY: ErrorCategory.NOT_EMPTY,
  EEXIST: ErrorCategory.NOT_EMPTY,
  EXDEV: ErrorCategory.CROSS_DEVICE,
  ENOSPC: ErrorCategory.FILE_SYSTEM,
  EIO: ErrorCategory.FILE_SYSTEM,
  EISDIR: ErrorCategory.FILE_SYSTEM,
  EINVAL: ErrorCategory.FILE_SYSTEM,
  ELOOP: ErrorCategory.FILE_SYSTEM,
  ENAMETOOLONG: ErrorCategory.FILE_SYSTEM,
};

/**
 * Read the errno code Node attaches to filesystem errors
 */
export function getErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

// Errors raised by Node itself may come from another realm, so match on shape
export function getErrorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

/**
 * Categorizes per-item failures and keeps running statistics for the final summary
 */
export class ErrorHandler {
  private readonly logger: Logger;
  private readonly statistics: ErrorStatistics;

  constructor(logger: Logger) {
    this.logger = logger;
    this.statistics = {
      totalErrors: 0,
      errorsByCategory: {
        [ErrorCategory.NOT_FOUND]: 0,
        [ErrorCategory.PERMISSION]: 0,
        [ErrorCategory.BUSY]: 0,
        [ErrorCategory.NOT_EMPTY]: 0,
        [ErrorCategory.CROSS_DEVICE]: 0,
        [ErrorCategory.FILE_SYSTEM]: 0,
        [ErrorCategory.CONFIGURATION]: 0,
        [ErrorCategory.UNKNOWN]: 0,
      },
    };
  }

  /**
   * Categorize, count and log an error
   */
  handleError(error: unknown, context: ErrorContext): CategorizedError {
    const categorized: CategorizedError = {
      category: ErrorHandler.categorize(error),
      code: getErrorCode(error),
      message: getErrorMessage(error),
      context,
    };

    this.statistics.totalErrors++;
    this.statistics.errorsByCategory[categorized.category]++;

    const logMeta = {
      category: categorized.category,
      code: categorized.code,
      filePath: context.filePath,
    };
    if (categorized.category === ErrorCategory.NOT_FOUND) {
      this.logger.warn(`${context.operation} failed: ${categorized.message}`, logMeta);
    } else {
      this.logger.error(`${context.operation} failed: ${categorized.message}`, logMeta);
    }

    return categorized;
  }

  static categorize(error: unknown): ErrorCategory {
    if (error instanceof ConfigurationError) {
      return ErrorCategory.CONFIGURATION;
    }

    const code = getErrorCode(error);
    if (code && code in CODE_CATEGORIES) {
      return CODE_CATEGORIES[code];
    }

    return ErrorCategory.UNKNOWN;
  }

  getStatistics(): ErrorStatistics {
    return {
      totalErrors: this.statistics.totalErrors,
      errorsByCategory: { ...this.statistics.errorsByCategory },
    };
  }
}
