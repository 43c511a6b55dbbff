/**
 * Error details carried alongside an application error
 */
export type ErrorDetails = Record<string, unknown>;

/**
 * Base application error class
 */
export abstract class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public details?: ErrorDetails;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    isOperational: boolean = true,
    details?: ErrorDetails
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);

    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.details = details;
    this.timestamp = new Date();

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON
   */
  toJSON(): ErrorResponse {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      timestamp: this.timestamp,
      details: this.details
    };
  }
}

/**
 * Error response interface
 */
export interface ErrorResponse {
  name: string;
  message: string;
  code: string;
  statusCode: number;
  timestamp: Date;
  details?: ErrorDetails;
}

/**
 * Codes for the per-item download failures
 */
export enum DownloadErrorCode {
  RESOLUTION_FAILED = 'RESOLUTION_FAILED',
  NO_FILE_NAME = 'NO_FILE_NAME',
  DESTINATION_EXISTS = 'DESTINATION_EXISTS',
  STREAM_UNAVAILABLE = 'STREAM_UNAVAILABLE',
  DIRECTORY_CREATE_FAILED = 'DIRECTORY_CREATE_FAILED',
  TEMP_FILE_FAILED = 'TEMP_FILE_FAILED',
  TRANSFER_FAILED = 'TRANSFER_FAILED',
  FINALIZE_FAILED = 'FINALIZE_FAILED'
}

/**
 * Validation error
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'VALIDATION_ERROR', 400, true, details);
  }
}

/**
 * Internal error
 */
export class InternalError extends AppError {
  constructor(message: string = 'Internal error', details?: ErrorDetails) {
    super(message, 'INTERNAL_ERROR', 500, false, details);
  }
}

/**
 * Configuration error
 */
export class ConfigurationError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'CONFIGURATION_ERROR', 500, false, details);
  }
}

/**
 * No identity candidate produced a successful header response
 */
export class ResolutionError extends AppError {
  constructor(uri: string, status: number, reason: string) {
    super(
      `Failed to resolve ${uri}: ${describeStatus(status, reason)}`,
      DownloadErrorCode.RESOLUTION_FAILED,
      502,
      true,
      { uri, status, reason }
    );
  }
}

export class NoFileNameError extends AppError {
  constructor(uri: string) {
    super(
      `Could not determine a file name for ${uri}; pass one explicitly`,
      DownloadErrorCode.NO_FILE_NAME,
      422,
      true,
      { uri }
    );
  }
}

export class ClobberError extends AppError {
  constructor(destinationPath: string) {
    super(
      `Destination already exists: ${destinationPath}`,
      DownloadErrorCode.DESTINATION_EXISTS,
      409,
      true,
      { destinationPath }
    );
  }
}

/**
 * No identity candidate produced a readable body stream
 */
export class StreamUnavailableError extends AppError {
  constructor(uri: string, status: number, reason: string) {
    super(
      `Could not open a content stream for ${uri}: ${describeStatus(status, reason)}`,
      DownloadErrorCode.STREAM_UNAVAILABLE,
      502,
      true,
      { uri, status, reason }
    );
  }
}

export class DirectoryCreateError extends AppError {
  constructor(directory: string, cause: unknown) {
    super(
      `Failed to create directory ${directory}: ${errorMessage(cause)}`,
      DownloadErrorCode.DIRECTORY_CREATE_FAILED,
      500,
      true,
      { directory }
    );
  }
}

export class TempFileError extends AppError {
  constructor(tempPath: string, cause: unknown) {
    super(
      `Failed to create temporary file ${tempPath}: ${errorMessage(cause)}`,
      DownloadErrorCode.TEMP_FILE_FAILED,
      500,
      true,
      { tempPath }
    );
  }
}

/**
 * Read or write failure in the middle of a copy
 */
export class TransferError extends AppError {
  constructor(uri: string, bytesWritten: number, cause: unknown, tempPath?: string) {
    super(
      `Transfer of ${uri} failed after ${bytesWritten} bytes: ${errorMessage(cause)}`,
      DownloadErrorCode.TRANSFER_FAILED,
      502,
      true,
      { uri, bytesWritten, ...(tempPath !== undefined && { tempPath }) }
    );
  }
}

export class FinalizeError extends AppError {
  constructor(tempPath: string, destinationPath: string, cause: unknown) {
    super(
      `Failed to move ${tempPath} to ${destinationPath}: ${errorMessage(cause)}`,
      DownloadErrorCode.FINALIZE_FAILED,
      500,
      true,
      { tempPath, destinationPath }
    );
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  if (isErrorLike(error)) {
    return error.message;
  }
  return String(error);
}

/**
 * Structural check; errors thrown by Node core come from another realm under Jest
 */
export function isErrorLike(error: unknown): error is Error {
  return (
    typeof error === 'object' &&
    error !== null &&
    'message' in error &&
    typeof error.message === 'string' &&
    'name' in error &&
    typeof error.name === 'string'
  );
}

/**
 * Narrow an unknown thrown value to a Node.js system error
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string';
}

function describeStatus(status: number, reason: string): string {
  return status > 0 ? `HTTP ${status} ${reason}`.trim() : reason;
}
