/**
 * @cancel-triage/shared
 * Shared utilities and types for the cancellation triage workspace
 */

// Environment utilities
export {
  loadEnv,
  findProjectRoot,
  getEnv,
  getEnvFlag,
  type EnvLoaderOptions,
  type EnvSource,
} from './env-loader.js';

// Types
export {
  // Config types
  type ReamazeConfig,
  type AnthropicConfig,
  type SpApiCredentials,
  type SpApiRegion,
  type SpApiConfig,
  // MCP types
  type MCPTextContent,
  type MCPResponse,
  // Response helpers
  createTextResponse,
  createJsonResponse,
  // Utility types
  type OperationResult,
} from './types.js';

// Error handling
export {
  TriageError,
  ValidationError,
  ApiError,
  AuthenticationError,
  ConfigurationError,
  MethodNotFoundError,
  ModelUnavailableError,
  SignatureMismatchError,
  withErrorHandling,
  getErrorMessage,
  extractApiErrorDetails,
  createApiError,
} from './errors.js';

// Logging
export { createLogger, silentLogger, type Logger } from './logger.js';
