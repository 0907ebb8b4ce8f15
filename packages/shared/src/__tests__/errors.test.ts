/**
 * Error helpers Unit Tests
 * Tests vendor error extraction and MCP error conversion
 */

import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import {
  ApiError,
  ConfigurationError,
  TriageError,
  ValidationError,
  createApiError,
  extractApiErrorDetails,
  getErrorMessage,
  withErrorHandling,
} from '../errors';

function httpError(status: number, data: unknown): Error {
  return Object.assign(new Error(`Request failed with status code ${status}`), {
    response: { status, data },
  });
}

describe('errors', () => {
  describe('getErrorMessage', () => {
    it('should read Error instances', () => {
      expect(getErrorMessage(new Error('boom'))).toBe('boom');
    });

    it('should pass strings through', () => {
      expect(getErrorMessage('plain failure')).toBe('plain failure');
    });

    it('should read message-like objects', () => {
      expect(getErrorMessage({ message: 'from object' })).toBe('from object');
    });

    it('should stringify anything else', () => {
      expect(getErrorMessage(42)).toBe('42');
    });
  });

  describe('extractApiErrorDetails', () => {
    it('should join SP-API style error lists', () => {
      const error = httpError(400, {
        errors: [
          { code: 'InvalidInput', message: 'Order is not cancellable' },
          { code: 'Secondary', message: 'Second problem' },
        ],
      });

      expect(extractApiErrorDetails(error)).toEqual({
        message: 'InvalidInput: Order is not cancellable; Secondary: Second problem',
        statusCode: 400,
        data: {
          errors: [
            { code: 'InvalidInput', message: 'Order is not cancellable' },
            { code: 'Secondary', message: 'Second problem' },
          ],
        },
      });
    });

    it('should prefer error_description for token endpoint errors', () => {
      const error = httpError(400, { error: 'invalid_grant', error_description: 'The refresh token is invalid' });
      expect(extractApiErrorDetails(error).message).toBe('The refresh token is invalid');
    });

    it('should fall back to the error field', () => {
      const error = httpError(403, { error: 'Forbidden' });
      expect(extractApiErrorDetails(error).message).toBe('Forbidden');
    });

    it('should use a plain string body', () => {
      const error = httpError(404, '  Not Found  ');
      expect(extractApiErrorDetails(error).message).toBe('Not Found');
    });

    it('should keep the transport message when the body says nothing', () => {
      const error = httpError(500, {});
      expect(extractApiErrorDetails(error)).toEqual({
        message: 'Request failed with status code 500',
        statusCode: 500,
        data: {},
      });
    });

    it('should handle errors without a response', () => {
      expect(extractApiErrorDetails(new Error('socket hang up'))).toEqual({ message: 'socket hang up' });
    });
  });

  describe('createApiError', () => {
    it('should prefix the context and keep status and cause', () => {
      const cause = httpError(422, { message: 'Unprocessable' });
      const error = createApiError(cause, 'Failed to add tags');

      expect(error).toBeInstanceOf(ApiError);
      expect(error.message).toBe('Failed to add tags: Unprocessable');
      expect(error.statusCode).toBe(422);
      expect(error.cause).toBe(cause);
    });
  });

  describe('toMcpError', () => {
    it('should map validation errors to InvalidParams', () => {
      const mcpError = new ValidationError('bad input').toMcpError();
      expect(mcpError).toBeInstanceOf(McpError);
      expect(mcpError.code).toBe(ErrorCode.InvalidParams);
    });

    it('should map other triage errors to InternalError', () => {
      expect(new ConfigurationError('no config').toMcpError().code).toBe(ErrorCode.InternalError);
    });
  });

  describe('withErrorHandling', () => {
    it('should return the result on success', async () => {
      await expect(withErrorHandling(async () => 'done')).resolves.toBe('done');
    });

    it('should convert triage errors to MCP errors', async () => {
      const promise = withErrorHandling(async () => {
        throw new TriageError('failed inside');
      });
      await expect(promise).rejects.toBeInstanceOf(McpError);
      await expect(promise).rejects.toHaveProperty('code', ErrorCode.InternalError);
    });

    it('should use the provided error handler', async () => {
      const result = await withErrorHandling(
        async (): Promise<string> => {
          throw new Error('nope');
        },
        (error) => `handled: ${error.message}`
      );
      expect(result).toBe('handled: nope');
    });
  });
});
