/**
 * Shared type definitions
 * Vendor configuration and MCP response shapes used across packages
 */

// ============================================
// API Configuration Types
// ============================================

/**
 * Re:amaze ticketing API configuration (HTTP Basic: login email + API token)
 */
export interface ReamazeConfig {
  /** Subdomain, e.g. "acme" for https://acme.reamaze.io */
  brand: string;
  /** Login email of the account that owns the API token */
  email: string;
  apiToken: string;
  /** Target one conversation slug instead of the first unresolved one */
  limitToSlug?: string;
  timeoutMs?: number;
}

/**
 * Anthropic Messages API configuration
 */
export interface AnthropicConfig {
  apiKey?: string;
  /** Tried before the built-in fallback list */
  modelOverride?: string;
}

/**
 * Selling Partner API credential bundle
 */
export interface SpApiCredentials {
  refreshToken: string;
  appId: string;
  clientSecret: string;
  /**
   * AWS settings are accepted but unused: SP-API authorizes requests with the
   * LWA access token alone, so nothing is SigV4-signed and no role is assumed.
   */
  awsAccessKey?: string;
  awsSecretKey?: string;
  roleArn?: string;
}

export type SpApiRegion = 'NA' | 'EU' | 'FE';

export interface SpApiConfig {
  /** null when any required credential is missing from the environment */
  credentials: SpApiCredentials | null;
  /** Names of the required variables that were missing */
  missing: string[];
  region: SpApiRegion;
  sandbox: boolean;
  timeoutMs?: number;
}

// ============================================
// MCP Response Types
// ============================================

/**
 * Standard MCP text content item
 */
export interface MCPTextContent {
  type: 'text';
  text: string;
  [key: string]: unknown;
}

/**
 * Standard MCP response structure
 */
export interface MCPResponse {
  content: MCPTextContent[];
  /** The SDK's result types are open objects */
  [key: string]: unknown;
}

/**
 * Create a standard MCP text response
 */
export function createTextResponse(text: string): MCPResponse {
  return {
    content: [{ type: 'text', text }]
  };
}

/**
 * Create a JSON response, pretty-printed
 */
export function createJsonResponse(value: unknown): MCPResponse {
  return createTextResponse(JSON.stringify(value, null, 2));
}

// ============================================
// Generic Utility Types
// ============================================

/**
 * Result of a best-effort remote mutation
 */
export interface OperationResult {
  ok: boolean;
  detail: string;
}
