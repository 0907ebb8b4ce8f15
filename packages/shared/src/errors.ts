/**
 * Shared error handling utilities for the triage workspace
 * Every remote call site converts failures into one of these classes
 */

import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';

/**
 * Base error class for triage operations
 */
export class TriageError extends Error {
  constructor(
    message: string,
    public readonly code: string = 'INTERNAL_ERROR',
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'TriageError';
  }

  /**
   * Convert to MCP SDK error format
   */
  toMcpError(): McpError {
    return new McpError(ErrorCode.InternalError, this.message);
  }
}

/**
 * Error for validation failures
 */
export class ValidationError extends TriageError {
  constructor(message: string, cause?: Error) {
    super(message, 'VALIDATION_ERROR', cause);
    this.name = 'ValidationError';
  }

  toMcpError(): McpError {
    return new McpError(ErrorCode.InvalidParams, this.message);
  }
}

/**
 * Error for API communication failures
 */
export class ApiError extends TriageError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly responseData?: unknown,
    cause?: Error
  ) {
    super(message, 'API_ERROR', cause);
    this.name = 'ApiError';
  }
}

/**
 * Error for authentication failures (bad token, token exchange rejected)
 */
export class AuthenticationError extends TriageError {
  constructor(message: string, cause?: Error) {
    super(message, 'AUTH_ERROR', cause);
    this.name = 'AuthenticationError';
  }
}

/**
 * Error for configuration issues
 */
export class ConfigurationError extends TriageError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigurationError';
  }
}

/**
 * Error for unknown MCP tools
 */
export class MethodNotFoundError extends TriageError {
  constructor(methodName: string) {
    super(`Unknown method: ${methodName}`, 'METHOD_NOT_FOUND');
    this.name = 'MethodNotFoundError';
  }

  toMcpError(): McpError {
    return new McpError(ErrorCode.MethodNotFound, this.message);
  }
}

/**
 * The language model provider does not know the requested model
 */
export class ModelUnavailableError extends TriageError {
  constructor(
    public readonly model: string,
    message: string,
    cause?: Error
  ) {
    super(message, 'MODEL_UNAVAILABLE', cause);
    this.name = 'ModelUnavailableError';
  }
}

/**
 * A client rejected the shape of a call (unknown operation, wrong arguments)
 */
export class SignatureMismatchError extends TriageError {
  constructor(message: string, cause?: Error) {
    super(message, 'SIGNATURE_MISMATCH', cause);
    this.name = 'SignatureMismatchError';
  }
}

// ============================================
// Error Handling Utilities
// ============================================

/**
 * Wrap an async handler with error handling
 * Catches errors and converts them to appropriate MCP errors
 */
export async function withErrorHandling<T>(
  fn: () => Promise<T>,
  errorHandler?: (error: Error) => T
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof McpError) {
      throw error;
    }

    if (errorHandler) {
      return errorHandler(error instanceof Error ? error : new Error(String(error)));
    }

    if (error instanceof TriageError) {
      throw error.toMcpError();
    }

    const message = error instanceof Error ? error.message : String(error);
    throw new McpError(ErrorCode.InternalError, `Error: ${message}`);
  }
}

/**
 * Extract error message from various error types
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}

/**
 * Read a human message out of a vendor error body.
 * Re:amaze uses `error`/`message`, SP-API uses `errors: [{ code, message }]`,
 * LWA uses `error_description`.
 */
function readVendorMessage(data: unknown): string | undefined {
  if (typeof data === 'string') {
    return data.trim() || undefined;
  }
  if (!data || typeof data !== 'object') {
    return undefined;
  }

  if ('errors' in data && Array.isArray(data.errors) && data.errors.length > 0) {
    const joined = data.errors
      .map((entry: unknown) => [readStringField(entry, 'code'), readStringField(entry, 'message')]
        .filter(Boolean)
        .join(': '))
      .filter(Boolean)
      .join('; ');
    if (joined) {
      return joined;
    }
  }

  return readStringField(data, 'error_description')
    || readStringField(data, 'message')
    || readStringField(data, 'error');
}

function readStringField(value: unknown, field: string): string | undefined {
  if (!value || typeof value !== 'object' || !(field in value)) {
    return undefined;
  }
  const candidate: unknown = Reflect.get(value, field);
  return typeof candidate === 'string' && candidate ? candidate : undefined;
}

/**
 * Extract API error details from axios-like error responses
 */
export function extractApiErrorDetails(error: unknown): {
  message: string;
  statusCode?: number;
  data?: unknown;
} {
  const baseMessage = getErrorMessage(error);

  if (error && typeof error === 'object' && 'response' in error) {
    const response = error.response;
    if (response && typeof response === 'object') {
      const status = 'status' in response && typeof response.status === 'number'
        ? response.status
        : undefined;
      const data = 'data' in response ? response.data : undefined;

      return {
        message: readVendorMessage(data) || baseMessage,
        statusCode: status,
        data,
      };
    }
  }

  return { message: baseMessage };
}

/**
 * Create an API error from an axios-like error
 */
export function createApiError(error: unknown, context: string): ApiError {
  const details = extractApiErrorDetails(error);
  return new ApiError(
    `${context}: ${details.message}`,
    details.statusCode,
    details.data,
    error instanceof Error ? error : undefined
  );
}
