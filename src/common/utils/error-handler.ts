import { Logger } from '@nestjs/common';

/**
 * Base class for application errors
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly metadata?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Get a string representation of the error
   */
  toString(): string {
    return `${this.name}(${this.code}): ${this.message}`;
  }
}

/**
 * Error for RPC-related issues
 */
export class RpcError extends AppError {
  constructor(
    message: string,
    public readonly host?: string,
    public readonly method?: string,
    metadata?: Record<string, unknown>,
  ) {
    super(message, 'RPC_ERROR', { ...metadata, host, method });
  }
}

/**
 * Error for configuration issues
 */
export class ConfigurationError extends AppError {
  constructor(
    message: string,
    public readonly configKey?: string,
    metadata?: Record<string, unknown>,
  ) {
    super(message, 'CONFIGURATION_ERROR', { ...metadata, configKey });
  }
}

/**
 * Extract a message from anything that was thrown
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Utility class for consistent error handling across the application
 */
export class ErrorHandler {
  private readonly logger: Logger;

  constructor(context: string) {
    this.logger = new Logger(context);
  }

  /**
   * Create and log a specific RPC error
   */
  handleRpcError(message: string, host?: string, method?: string, metadata?: Record<string, unknown>): RpcError {
    const error = new RpcError(message, host, method, metadata);
    this.logger.debug(
      `${error.name}(${error.code}): ${message} [host: ${host || 'unknown'}, method: ${method || 'unknown'}]`,
    );
    return error;
  }
}
