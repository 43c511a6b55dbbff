import {
  AppError,
  ErrorResponse,
  InternalError,
  ValidationError,
  isErrorLike
} from './AppError';
import { ILogger, LoggerFactory } from '../logging/Logger';

/**
 * What the failed work was about, such as the URL of a batch item
 */
export interface ErrorContext {
  subject?: string;
}

export type ErrorListener = (error: AppError, context: ErrorContext) => void;

/**
 * Global error handler
 */
export class ErrorHandler {
  private static instance: ErrorHandler | undefined;
  private errorListeners: ErrorListener[] = [];

  private constructor(private readonly logger: ILogger) {}

  /**
   * Get singleton instance
   */
  static getInstance(): ErrorHandler {
    if (!ErrorHandler.instance) {
      ErrorHandler.instance = new ErrorHandler(LoggerFactory.getLogger('ErrorHandler'));
    }
    return ErrorHandler.instance;
  }

  /**
   * Log, notify listeners and describe the error
   */
  handle(error: unknown, context: ErrorContext = {}): ErrorResponse {
    const appError = this.normalize(error);

    this.logError(appError);
    this.notifyListeners(appError, context);

    return appError.toJSON();
  }

  addListener(listener: ErrorListener): void {
    this.errorListeners.push(listener);
  }

  removeListener(listener: ErrorListener): void {
    const index = this.errorListeners.indexOf(listener);
    if (index > -1) {
      this.errorListeners.splice(index, 1);
    }
  }

  /**
   * Normalize error to AppError
   */
  normalize(error: unknown): AppError {
    if (error instanceof AppError) {
      return error;
    }

    if (!isErrorLike(error)) {
      return new InternalError(String(error));
    }

    if (error.name === 'ValidationError') {
      return new ValidationError(error.message);
    }

    return new InternalError(error.message, {
      originalError: error.name,
      stack: error.stack
    });
  }

  private logError(error: AppError): void {
    // Operational failures reach the user through a listener
    if (error.isOperational) {
      this.logger.debug(`[${error.code}] ${error.message}`, error.details);
    } else {
      this.logger.error('Non-operational error', error, error.details);
    }
  }

  private notifyListeners(error: AppError, context: ErrorContext): void {
    this.errorListeners.forEach(listener => {
      try {
        listener(error, context);
      } catch (listenerError) {
        this.logger.error('Error in error listener', listenerError);
      }
    });
  }
}
