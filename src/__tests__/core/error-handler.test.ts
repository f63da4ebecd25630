import {
  ConfigurationError,
  ErrorCategory,
  ErrorHandler,
  NotADirectoryError,
  getErrorCode,
  getErrorMessage,
} from '../../core/error-handler';
import { Logger } from '../../types';

function fsError(code: string, message = `${code}: failure`): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(message);
  error.code = code;
  return error;
}

describe('ErrorHandler', () => {
  let logger: Logger;
  let errorHandler: ErrorHandler;

  beforeEach(() => {
    logger = { error: jest.fn(), warn: jest.fn(), info: jest.fn(), debug: jest.fn() };
    errorHandler = new ErrorHandler(logger);
  });

  describe('Error Categorization', () => {
    it.each([
      ['ENOENT', ErrorCategory.NOT_FOUND],
      ['EACCES', ErrorCategory.PERMISSION],
      ['EPERM', ErrorCategory.PERMISSION],
      ['EBUSY', ErrorCategory.BUSY],
      ['ENOTEMPTY', ErrorCategory.NOT_EMPTY],
      ['EXDEV', ErrorCategory.CROSS_DEVICE],
      ['EINVAL', ErrorCategory.FILE_SYSTEM],
      ['ENOTDIR', ErrorCategory.FILE_SYSTEM],
    ])('should categorize %s as %s', (code, category) => {
      expect(ErrorHandler.categorize(fsError(code))).toBe(category);
    });

    it('should categorize configuration errors', () => {
      expect(ErrorHandler.categorize(new NotADirectoryError('/nowhere'))).toBe(ErrorCategory.CONFIGURATION);
      expect(ErrorHandler.categorize(new ConfigurationError('bad'))).toBe(ErrorCategory.CONFIGURATION);
    });

    it('should fall back to unknown', () => {
      expect(ErrorHandler.categorize(new Error('plain'))).toBe(ErrorCategory.UNKNOWN);
      expect(ErrorHandler.categorize('not an error')).toBe(ErrorCategory.UNKNOWN);
      expect(ErrorHandler.categorize(fsError('ESOMETHING'))).toBe(ErrorCategory.UNKNOWN);
    });
  });

  describe('handleError', () => {
    it('should return the category, code and message with the context', () => {
      const context = { operation: 'move', filePath: '/data/x.txt', timestamp: new Date() };

      const categorized = errorHandler.handleError(fsError('EACCES', 'permission denied'), context);

      expect(categorized).toEqual({
        category: ErrorCategory.PERMISSION,
        code: 'EACCES',
        message: 'permission denied',
        context,
      });
      expect(logger.error).toHaveBeenCalledWith('move failed: permission denied', {
        category: ErrorCategory.PERMISSION,
        code: 'EACCES',
        filePath: '/data/x.txt',
      });
    });

    it('should log missing items as warnings', () => {
      errorHandler.handleError(fsError('ENOENT', 'gone'), { operation: 'delete', timestamp: new Date() });

      expect(logger.warn).toHaveBeenCalledTimes(1);
      expect(logger.error).not.toHaveBeenCalled();
    });

    it('should keep statistics per category', () => {
      const context = { operation: 'delete', timestamp: new Date() };
      errorHandler.handleError(fsError('EBUSY'), context);
      errorHandler.handleError(fsError('EBUSY'), context);
      errorHandler.handleError(new Error('odd'), context);

      const statistics = errorHandler.getStatistics();

      expect(statistics.totalErrors).toBe(3);
      expect(statistics.errorsByCategory[ErrorCategory.BUSY]).toBe(2);
      expect(statistics.errorsByCategory[ErrorCategory.UNKNOWN]).toBe(1);
      expect(statistics.errorsByCategory[ErrorCategory.PERMISSION]).toBe(0);
    });

    it('should hand out copies of the statistics', () => {
      const snapshot = errorHandler.getStatistics();
      errorHandler.handleError(fsError('EIO'), { operation: 'move', timestamp: new Date() });

      expect(snapshot.totalErrors).toBe(0);
      expect(snapshot.errorsByCategory[ErrorCategory.FILE_SYSTEM]).toBe(0);
    });
  });

  describe('helpers', () => {
    it('should read error codes by shape', () => {
      expect(getErrorCode(fsError('EXDEV'))).toBe('EXDEV');
      expect(getErrorCode(new Error('no code'))).toBeUndefined();
      expect(getErrorCode({ code: 'EXDEV', message: 'cross-device link' })).toBe('EXDEV');
      expect(getErrorCode({ code: 18 })).toBeUndefined();
      expect(getErrorCode(null)).toBeUndefined();
    });

    it('should read messages by shape and stringify other values', () => {
      expect(getErrorMessage(new Error('boom'))).toBe('boom');
      expect(getErrorMessage({ message: 'plain object' })).toBe('plain object');
      expect(getErrorMessage(42)).toBe('42');
    });

    it('should categorize errors that are not Error instances', () => {
      const foreign = { code: 'ENOENT', message: "ENOENT: no such file or directory, lstat '/gone'" };

      expect(ErrorHandler.categorize(foreign)).toBe(ErrorCategory.NOT_FOUND);
    });

    it('should include the reason in not-a-directory messages', () => {
      expect(new NotADirectoryError('/srv/data', 'ENOENT').message).toBe(
        "Provided search location '/srv/data' is not a valid directory (ENOENT)"
      );
    });
  });
});
