/**
 * Base Handler for Common MCP Tool Operations
 */

import { McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import type { z } from 'zod';
import {
  TriageError,
  createJsonResponse,
  createTextResponse,
  getErrorMessage,
  type MCPResponse,
} from '@cancel-triage/shared';

export abstract class BaseHandler {

  /**
   * Validate tool arguments against a schema
   */
  protected parseArgs<S extends z.ZodTypeAny>(schema: S, args: unknown): z.output<S> {
    const result = schema.safeParse(args ?? {});
    if (!result.success) {
      const problems = result.error.issues
        .map(issue => {
          const field = issue.path.join('.');
          return issue.code === 'invalid_type' && issue.received === 'undefined'
            ? `${field} is required`
            : `${field || 'arguments'}: ${issue.message}`;
        })
        .join('; ');
      throw new McpError(ErrorCode.InvalidParams, problems);
    }
    return result.data;
  }

  /**
   * Handle errors consistently
   */
  protected handleError(error: unknown, operation: string): never {
    if (error instanceof McpError) {
      throw error;
    }
    if (error instanceof TriageError) {
      throw error.toMcpError();
    }

    throw new McpError(
      ErrorCode.InternalError,
      `Failed to ${operation}: ${getErrorMessage(error)}`
    );
  }

  /**
   * Format success response
   */
  protected formatResponse(text: string): MCPResponse {
    return createTextResponse(text);
  }

  protected formatJson(value: unknown): MCPResponse {
    return createJsonResponse(value);
  }
}
