/**
 * Fulfillment Service
 * Cancels a fulfillment order through the Selling Partner API. Only the
 * decision engine's live path calls cancel(); dry runs stop at
 * buildCancelPayload().
 */

import {
  ApiError,
  AuthenticationError,
  ConfigurationError,
  SignatureMismatchError,
  createLogger,
  getErrorMessage,
  type Logger,
} from '@cancel-triage/shared';
import type { CancelPayload, CancelResult } from '../../../types/index.js';
import type { IFulfillmentAdapter, IFulfillmentClient } from '../models/service-interfaces.js';
import { CANCEL_CALL_SHAPES, type CancelCallShape } from './call-shapes.js';
import { isRecord } from './response-parser.js';

export type FulfillmentClientFactory = () => IFulfillmentClient;

export function buildCancelPayload(orderId: string): CancelPayload {
  return {
    operation: 'cancel_fulfillment_order',
    sellerFulfillmentOrderId: orderId,
    reasonCode: 'CustomerRequest',
    comment: 'Automated cancellation request',
  };
}

/**
 * SP-API wraps results in `payload`; older responses are the bare body
 */
export function unwrapPayload(response: unknown): unknown {
  if (isRecord(response) && 'payload' in response) {
    return response.payload;
  }
  return response ?? {};
}

function toFailure(error: unknown): CancelResult {
  if (error instanceof ConfigurationError || error instanceof AuthenticationError) {
    return { ok: false, kind: 'setup', error: `SP-API client setup failed: ${error.message}` };
  }
  if (error instanceof ApiError) {
    return { ok: false, kind: 'provider', error: error.message };
  }
  return { ok: false, kind: 'unexpected', error: `Unexpected: ${getErrorMessage(error)}` };
}

export class FulfillmentService implements IFulfillmentAdapter {
  private logger: Logger;

  constructor(
    private createClient: FulfillmentClientFactory,
    private callShapes: readonly CancelCallShape[] = CANCEL_CALL_SHAPES,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('Fulfillment');
  }

  buildCancelPayload(orderId: string): CancelPayload {
    return buildCancelPayload(orderId);
  }

  /**
   * One attempt, never retried: a cancellation is not idempotent on the provider side.
   * Falling through call shapes is not a retry; a rejected shape never reaches the network.
   */
  async cancel(orderId: string): Promise<CancelResult> {
    let client: IFulfillmentClient;
    try {
      client = this.createClient();
    } catch (error) {
      this.logger.error(`cannot build client: ${getErrorMessage(error)}`);
      return { ok: false, kind: 'setup', error: `SP-API client setup failed: ${getErrorMessage(error)}` };
    }

    let lastMismatch = 'no call shapes configured';

    try {
      for (const shape of this.callShapes) {
        try {
          const response = await client.callOperation(shape.toCall(orderId));
          this.logger.info(`cancelFulfillmentOrder(${orderId}) accepted via ${shape.name} call shape`);
          return { ok: true, payload: unwrapPayload(response) };
        } catch (error) {
          if (!(error instanceof SignatureMismatchError)) {
            throw error;
          }
          lastMismatch = error.message;
          this.logger.warn(`${shape.name} call shape rejected: ${error.message}`);
        }
      }
      return { ok: false, kind: 'signature', error: `Signature mismatch: ${lastMismatch}` };
    } catch (error) {
      const failure = toFailure(error);
      this.logger.error(`cancelFulfillmentOrder(${orderId}) failed: ${getErrorMessage(error)}`);
      return failure;
    }
  }
}
