/**
 * SpApiClient Unit Tests
 * HTTP goes through an in-process axios adapter; nothing leaves the test
 */

import axios, { AxiosError, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import {
  ApiError,
  AuthenticationError,
  ConfigurationError,
  SignatureMismatchError,
  type Logger,
  type SpApiConfig,
  type SpApiCredentials,
} from '@cancel-triage/shared';
import { LWA_TOKEN_URL, SpApiClient, ignoredAwsSettings, resolveOperationCall } from '../sp-api-client';

const credentials: SpApiCredentials = {
  refreshToken: 'test-refresh-token',
  appId: 'test-app-id',
  clientSecret: 'test-secret',
};

function spApiConfig(overrides: Partial<SpApiConfig> = {}): SpApiConfig {
  return { credentials, missing: [], region: 'NA', sandbox: true, ...overrides };
}

function respond(config: InternalAxiosRequestConfig, status: number, data: unknown): AxiosResponse {
  const response: AxiosResponse = { data, status, statusText: String(status), headers: {}, config };
  if (status >= 400) {
    throw new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_REQUEST', config, null, response);
  }
  return response;
}

describe('resolveOperationCall', () => {
  it('should resolve an endpoint + operation call', () => {
    const request = resolveOperationCall({
      endpoint: 'fulfillmentOutbound',
      operation: 'cancelFulfillmentOrder',
      path: { sellerFulfillmentOrderId: 'Shopify #91057.1' },
    });

    expect(request).toEqual({
      label: 'fulfillmentOutbound.cancelFulfillmentOrder',
      method: 'PUT',
      path: '/fba/outbound/2020-07-01/fulfillmentOrders/Shopify%20%2391057.1/cancel',
      query: undefined,
      body: undefined,
    });
  });

  it('should resolve a dotted operation name', () => {
    const request = resolveOperationCall({ operation: 'sellers.getMarketplaceParticipations' });
    expect(request.method).toBe('GET');
    expect(request.path).toBe('/sellers/v1/marketplaceParticipations');
  });

  it('should pass raw paths through', () => {
    const request = resolveOperationCall({ apiPath: '/fba/outbound/2020-07-01/fulfillmentOrders/X/cancel', method: 'PUT' });
    expect(request.label).toBe('PUT /fba/outbound/2020-07-01/fulfillmentOrders/X/cancel');
    expect(request.path).toBe('/fba/outbound/2020-07-01/fulfillmentOrders/X/cancel');
  });

  it('should reject an operation without endpoint', () => {
    expect(() => resolveOperationCall({ operation: 'cancelFulfillmentOrder' })).toThrow(
      new SignatureMismatchError('Operation "cancelFulfillmentOrder" needs an endpoint')
    );
  });

  it('should reject unknown operations', () => {
    expect(() => resolveOperationCall({ endpoint: 'orders', operation: 'cancelOrder' })).toThrow(
      'Unknown operation "orders.cancelOrder"'
    );
  });

  it('should reject missing path parameters', () => {
    expect(() => resolveOperationCall({ operation: 'fulfillmentOutbound.cancelFulfillmentOrder' })).toThrow(
      'Missing path parameter "sellerFulfillmentOrderId" for fulfillmentOutbound.cancelFulfillmentOrder'
    );
  });

  it('should reject relative raw paths', () => {
    expect(() => resolveOperationCall({ apiPath: 'fba/x', method: 'GET' })).toThrow(SignatureMismatchError);
  });
});

describe('ignoredAwsSettings', () => {
  it('should name the AWS settings present in the bundle', () => {
    expect(ignoredAwsSettings(credentials)).toEqual([]);
    expect(ignoredAwsSettings({ ...credentials, awsAccessKey: 'test-access-key', awsSecretKey: 'test-secret-key' }))
      .toEqual(['AWS_ACCESS_KEY_ID', 'AWS_SECRET_ACCESS_KEY']);
  });
});

describe('SpApiClient', () => {
  const adapter = jest.fn<Promise<AxiosResponse>, [InternalAxiosRequestConfig]>();
  const http = axios.create({ adapter });

  beforeEach(() => {
    jest.clearAllMocks();
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('constructor', () => {
    it('should require the credential bundle', () => {
      expect(() => new SpApiClient(spApiConfig({ credentials: null, missing: ['REFRESH_TOKEN', 'LWA_CLIENT_SECRET'] }))).toThrow(
        new ConfigurationError('Missing SP-API credentials: REFRESH_TOKEN, LWA_CLIENT_SECRET')
      );
    });

    it('should warn that AWS settings are not used', () => {
      const logger: Logger = { info: jest.fn(), warn: jest.fn(), error: jest.fn() };
      const config = spApiConfig({
        credentials: { ...credentials, awsAccessKey: 'test-access-key', roleArn: 'arn:aws:iam::000000000000:role/sp-api' },
      });

      new SpApiClient(config, http, logger);

      expect(logger.warn).toHaveBeenCalledWith(
        'AWS_ACCESS_KEY_ID, AWS_SELLER_PARTNER_ROLE_ARN set but unused; requests are authorized with the LWA token only'
      );
    });

    it('should not warn without AWS settings', () => {
      const logger: Logger = { info: jest.fn(), warn: jest.fn(), error: jest.fn() };

      new SpApiClient(spApiConfig(), http, logger);

      expect(logger.warn).not.toHaveBeenCalled();
    });

    it('should pick the sandbox host', () => {
      expect(new SpApiClient(spApiConfig(), http).getBaseUrl()).toBe('https://sandbox.sellingpartnerapi-na.amazon.com');
    });

    it('should pick the production host for the region', () => {
      const client = new SpApiClient(spApiConfig({ sandbox: false, region: 'EU' }), http);
      expect(client.getBaseUrl()).toBe('https://sellingpartnerapi-eu.amazon.com');
    });
  });

  describe('callOperation', () => {
    it('should exchange the refresh token once and send the access token', async () => {
      adapter.mockImplementation(async (config) =>
        config.url === LWA_TOKEN_URL
          ? respond(config, 200, { access_token: 'test-access-token', expires_in: 3600 })
          : respond(config, 200, { payload: { cancelled: true } })
      );
      const client = new SpApiClient(spApiConfig(), http);

      const call = {
        endpoint: 'fulfillmentOutbound',
        operation: 'cancelFulfillmentOrder',
        path: { sellerFulfillmentOrderId: 'Shopify #91057.1' },
      };
      await expect(client.callOperation(call)).resolves.toEqual({ payload: { cancelled: true } });
      await client.callOperation(call);

      const urls = adapter.mock.calls.map(([config]) => config.url);
      expect(urls).toEqual([
        LWA_TOKEN_URL,
        'https://sandbox.sellingpartnerapi-na.amazon.com/fba/outbound/2020-07-01/fulfillmentOrders/Shopify%20%2391057.1/cancel',
        'https://sandbox.sellingpartnerapi-na.amazon.com/fba/outbound/2020-07-01/fulfillmentOrders/Shopify%20%2391057.1/cancel',
      ]);

      const [tokenRequest] = adapter.mock.calls[0];
      expect(tokenRequest.data).toBe(
        'grant_type=refresh_token&refresh_token=test-refresh-token&client_id=test-app-id&client_secret=test-secret'
      );

      const [apiRequest] = adapter.mock.calls[1];
      expect(apiRequest.method).toBe('put');
      expect(apiRequest.headers.get('x-amz-access-token')).toBe('test-access-token');
    });

    it('should authorize with the access token alone even when AWS keys are set', async () => {
      adapter.mockImplementation(async (config) =>
        config.url === LWA_TOKEN_URL
          ? respond(config, 200, { access_token: 'test-access-token', expires_in: 3600 })
          : respond(config, 200, { payload: [] })
      );
      const config = spApiConfig({
        credentials: { ...credentials, awsAccessKey: 'test-access-key', awsSecretKey: 'test-secret-key' },
      });
      const client = new SpApiClient(config, http);

      await client.callOperation({ operation: 'sellers.getMarketplaceParticipations' });

      const [apiRequest] = adapter.mock.calls[1];
      expect(apiRequest.headers.get('x-amz-access-token')).toBe('test-access-token');
      expect(apiRequest.headers.has('Authorization')).toBe(false);
      expect(apiRequest.headers.has('x-amz-date')).toBe(false);
    });

    it('should log request timings through the injected logger', async () => {
      const logger: Logger = { info: jest.fn(), warn: jest.fn(), error: jest.fn() };
      adapter.mockImplementation(async (config) =>
        config.url === LWA_TOKEN_URL
          ? respond(config, 200, { access_token: 'test-access-token', expires_in: 3600 })
          : respond(config, 200, { payload: [] })
      );
      const client = new SpApiClient(spApiConfig(), http, logger);

      await client.callOperation({ operation: 'sellers.getMarketplaceParticipations' });

      expect(logger.info).toHaveBeenCalledWith(
        expect.stringMatching(/^sellers\.getMarketplaceParticipations completed in \d+ms$/)
      );
    });

    it('should reject a call shape before any request', async () => {
      const client = new SpApiClient(spApiConfig(), http);

      await expect(client.callOperation({ operation: 'cancelFulfillmentOrder' })).rejects.toBeInstanceOf(
        SignatureMismatchError
      );
      expect(adapter).not.toHaveBeenCalled();
    });

    it('should report a rejected token exchange as an authentication error', async () => {
      adapter.mockImplementation(async (config) =>
        respond(config, 400, { error: 'invalid_grant', error_description: 'The refresh token is invalid' })
      );
      const client = new SpApiClient(spApiConfig(), http);

      const promise = client.callOperation({ operation: 'sellers.getMarketplaceParticipations' });
      await expect(promise).rejects.toBeInstanceOf(AuthenticationError);
      await expect(promise).rejects.toThrow('LWA token exchange failed: The refresh token is invalid');
    });

    it('should reject a token response without access token', async () => {
      adapter.mockImplementation(async (config) => respond(config, 200, { token_type: 'bearer' }));
      const client = new SpApiClient(spApiConfig(), http);

      await expect(client.callOperation({ operation: 'sellers.getMarketplaceParticipations' })).rejects.toThrow(
        'LWA token exchange returned no access token'
      );
    });

    it('should turn provider errors into ApiError', async () => {
      adapter.mockImplementation(async (config) =>
        config.url === LWA_TOKEN_URL
          ? respond(config, 200, { access_token: 'test-access-token', expires_in: 3600 })
          : respond(config, 400, { errors: [{ code: 'InvalidInput', message: 'Order cannot be cancelled' }] })
      );
      const client = new SpApiClient(spApiConfig(), http);

      const promise = client.callOperation({
        operation: 'fulfillmentOutbound.cancelFulfillmentOrder',
        path: { sellerFulfillmentOrderId: 'Shopify #91057.1' },
      });
      await expect(promise).rejects.toBeInstanceOf(ApiError);
      await expect(promise).rejects.toThrow(
        'SP-API fulfillmentOutbound.cancelFulfillmentOrder failed: InvalidInput: Order cannot be cancelled'
      );
      await expect(promise).rejects.toHaveProperty('statusCode', 400);
    });
  });
});
