/**
 * Error response formatter for MCP tools
 * Formats all errors as JSON with error type, message, context, and suggestions
 */

import * as path from 'path';
import { isManError } from '@manforge/core';
import type { ErrorResponse, ManError } from '@manforge/core';

/**
 * Create an error for a man page (or a page it includes) that cannot be opened
 */
export function createFileNotFoundError(filePath: string, reason?: string): ErrorResponse {
  return {
    error: 'FILE_NOT_FOUND',
    message: `man page not found: ${path.basename(filePath)}`,
    context: {
      path: filePath,
      ...(reason ? { reason } : {}),
    },
    suggestions: [
      'Check that the path is relative to MANFORGE_WORKSPACE_ROOT or absolute',
      'Names in .so requests are resolved against the directory of the including page',
      'Verify file permissions allow reading',
    ],
  };
}

/**
 * Create a processing error response
 */
export function createProcessingError(
  operation: string,
  error: unknown,
  context?: Record<string, unknown>
): ErrorResponse {
  const errorMessage = error instanceof Error ? error.message : String(error);

  const suggestions: string[] = [];

  if (errorMessage.startsWith('.so ')) {
    suggestions.push(
      'Remove the .so request that includes a page already being read',
      'Flatten deeply nested includes into fewer pages'
    );
  } else if (errorMessage.includes('T{')) {
    suggestions.push(
      'Close every T{ text block in the table with a T} line',
      'Check that the text block does not run into .TE or the end of the file'
    );
  } else if (operation.includes('convert')) {
    suggestions.push(
      'Check the page for unbalanced requests near the reported line',
      'Run the manforge CLI with --verbose to see each request as it is handled',
      'Try the raw format to rule out output wrapping problems'
    );
  } else {
    suggestions.push(
      'Check the error message for specific details',
      'Try the operation again with different parameters'
    );
  }

  return {
    error: 'PROCESSING_ERROR',
    message: `Failed to ${operation}: ${errorMessage}`,
    context: {
      operation,
      errorDetails: errorMessage,
      ...context,
    },
    suggestions,
  };
}

/**
 * Create an error for invalid configuration
 */
export function createConfigurationError(
  configKey: string,
  issue: string
): ErrorResponse {
  return {
    error: 'VALIDATION_ERROR',
    message: `Configuration error: ${configKey} - ${issue}`,
    context: {
      configKey,
      issue,
    },
    suggestions: [
      `Check the ${configKey} configuration value`,
      'Ensure environment variables are set correctly',
      'Restart the server after changing configuration',
    ],
  };
}

/**
 * Check if a value is an ErrorResponse
 */
export function isErrorResponse(value: unknown): value is ErrorResponse {
  return (
    typeof value === 'object' &&
    value !== null &&
    'error' in value &&
    'message' in value
  );
}

/**
 * Format error response as JSON string
 */
export function formatErrorResponse(error: ErrorResponse): string {
  return JSON.stringify(error, null, 2);
}

function fromManError(error: ManError, operation: string, context?: Record<string, unknown>): ErrorResponse {
  switch (error.type) {
    case 'SOURCE_NOT_FOUND': {
      const source = error.context.source;
      return createFileNotFoundError(typeof source === 'string' ? source : 'unknown', error.message);
    }
    case 'CONFIGURATION_ERROR':
      return createConfigurationError('format', error.message);
    default:
      return createProcessingError(operation, error, { ...error.context, ...context });
  }
}

/**
 * Safe error handler that never throws
 * Returns ErrorResponse for any error
 */
export function safeErrorHandler(
  error: unknown,
  operation: string,
  context?: Record<string, unknown>
): ErrorResponse {
  try {
    if (isErrorResponse(error)) {
      return error;
    }
    if (isManError(error)) {
      return fromManError(error, operation, context);
    }
    return createProcessingError(operation, error, context);
  } catch (handlerError) {
    // Fallback if error handling itself fails
    return {
      error: 'PROCESSING_ERROR',
      message: 'An unexpected error occurred',
      context: {
        operation,
        originalError: String(error),
        handlerError: String(handlerError),
        ...context,
      },
      suggestions: [
        'Check server logs for more information',
      ],
    };
  }
}
