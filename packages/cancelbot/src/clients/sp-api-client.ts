/**
 * Selling Partner API client (Fulfillment Outbound, Sellers)
 * Exchanges the LWA refresh token for an access token and calls operations
 * by name or by raw path. Requests are authorized with the
 * x-amz-access-token header only; AWS keys and role ARNs play no part.
 */

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import {
  AuthenticationError,
  ConfigurationError,
  SignatureMismatchError,
  createApiError,
  createLogger,
  extractApiErrorDetails,
  type Logger,
  type SpApiConfig,
  type SpApiCredentials,
  type SpApiRegion,
} from '@cancel-triage/shared';
import type {
  HttpMethod,
  IFulfillmentClient,
  OperationCall,
} from '../services/triage/models/service-interfaces.js';

export const LWA_TOKEN_URL = 'https://api.amazon.com/auth/o2/token';

const REGION_HOSTS: Record<SpApiRegion, string> = {
  NA: 'sellingpartnerapi-na.amazon.com',
  EU: 'sellingpartnerapi-eu.amazon.com',
  FE: 'sellingpartnerapi-fe.amazon.com',
};

interface OperationDefinition {
  method: HttpMethod;
  path: string;
}

/**
 * Operations this client knows by name, keyed "<endpoint>.<operation>"
 */
export const OPERATIONS: Record<string, OperationDefinition> = {
  'fulfillmentOutbound.cancelFulfillmentOrder': {
    method: 'PUT',
    path: '/fba/outbound/2020-07-01/fulfillmentOrders/{sellerFulfillmentOrderId}/cancel',
  },
  'sellers.getMarketplaceParticipations': {
    method: 'GET',
    path: '/sellers/v1/marketplaceParticipations',
  },
};

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive(),
});

/**
 * Names of the AWS settings present in a bundle, none of which this client uses
 */
export function ignoredAwsSettings(credentials: SpApiCredentials): string[] {
  const settings: Array<[string, string | undefined]> = [
    ['AWS_ACCESS_KEY_ID', credentials.awsAccessKey],
    ['AWS_SECRET_ACCESS_KEY', credentials.awsSecretKey],
    ['AWS_SELLER_PARTNER_ROLE_ARN', credentials.roleArn],
  ];
  return settings.filter(([, value]) => Boolean(value)).map(([name]) => name);
}

interface ResolvedRequest {
  label: string;
  method: HttpMethod;
  path: string;
  query?: Record<string, string>;
  body?: unknown;
}

/**
 * Map an operation call to method + path without sending anything
 *
 * @throws SignatureMismatchError for unknown operations or missing path parameters
 */
export function resolveOperationCall(call: OperationCall): ResolvedRequest {
  if ('apiPath' in call) {
    if (!call.apiPath.startsWith('/')) {
      throw new SignatureMismatchError(`apiPath must start with "/", got "${call.apiPath}"`);
    }
    return { label: `${call.method} ${call.apiPath}`, method: call.method, path: call.apiPath, query: call.query, body: call.body };
  }

  const key = call.endpoint ? `${call.endpoint}.${call.operation}` : call.operation;
  const definition = OPERATIONS[key];
  if (!definition) {
    throw new SignatureMismatchError(
      call.endpoint || key.includes('.')
        ? `Unknown operation "${key}"`
        : `Operation "${key}" needs an endpoint`
    );
  }

  const params = call.path ?? {};
  const path = definition.path.replace(/\{(\w+)\}/g, (_match, name: string) => {
    const value = params[name];
    if (!value) {
      throw new SignatureMismatchError(`Missing path parameter "${name}" for ${key}`);
    }
    return encodeURIComponent(value);
  });

  return { label: key, method: definition.method, path, query: call.query, body: call.body };
}

export class SpApiClient implements IFulfillmentClient {
  private http: AxiosInstance;
  private credentials: SpApiCredentials;
  private baseUrl: string;
  private accessToken: { value: string; expiresAt: number } | null = null;
  private logger: Logger;

  /** Refresh this long before the token actually expires */
  private static readonly TOKEN_SKEW_MS = 60 * 1000;

  /**
   * @throws ConfigurationError when the credential bundle is incomplete
   */
  constructor(config: SpApiConfig, http?: AxiosInstance, logger?: Logger) {
    if (!config.credentials) {
      throw new ConfigurationError(`Missing SP-API credentials: ${config.missing.join(', ') || 'unknown'}`);
    }

    this.logger = logger ?? createLogger('SP-API');
    const ignored = ignoredAwsSettings(config.credentials);
    if (ignored.length > 0) {
      this.logger.warn(`${ignored.join(', ')} set but unused; requests are authorized with the LWA token only`);
    }

    this.credentials = config.credentials;
    const host = REGION_HOSTS[config.region];
    this.baseUrl = `https://${config.sandbox ? `sandbox.${host}` : host}`;
    this.http = http ?? axios.create({ timeout: config.timeoutMs ?? 30000 });
  }

  getBaseUrl(): string {
    return this.baseUrl;
  }

  async callOperation(call: OperationCall): Promise<unknown> {
    const request = resolveOperationCall(call);
    const accessToken = await this.getAccessToken();
    const startTime = Date.now();

    try {
      const response = await this.http.request({
        method: request.method,
        url: `${this.baseUrl}${request.path}`,
        params: request.query,
        data: request.body,
        headers: {
          'x-amz-access-token': accessToken,
          'Accept': 'application/json',
          'Content-Type': 'application/json',
        },
      });
      this.logger.info(`${request.label} completed in ${Date.now() - startTime}ms`);
      return response.data;
    } catch (error) {
      this.logger.error(`${request.label} failed after ${Date.now() - startTime}ms`);
      throw createApiError(error, `SP-API ${request.label} failed`);
    }
  }

  private async getAccessToken(): Promise<string> {
    if (this.accessToken && this.accessToken.expiresAt - SpApiClient.TOKEN_SKEW_MS > Date.now()) {
      return this.accessToken.value;
    }

    const form = new URLSearchParams({
      grant_type: 'refresh_token',
      refresh_token: this.credentials.refreshToken,
      client_id: this.credentials.appId,
      client_secret: this.credentials.clientSecret,
    });

    let data: unknown;
    try {
      const response = await this.http.post(LWA_TOKEN_URL, form.toString(), {
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      });
      data = response.data;
    } catch (error) {
      throw new AuthenticationError(
        `LWA token exchange failed: ${extractApiErrorDetails(error).message}`,
        error instanceof Error ? error : undefined
      );
    }

    const parsed = tokenResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new AuthenticationError('LWA token exchange returned no access token');
    }

    this.accessToken = {
      value: parsed.data.access_token,
      expiresAt: Date.now() + parsed.data.expires_in * 1000,
    };
    return this.accessToken.value;
  }
}
