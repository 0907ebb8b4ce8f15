/**
 * Call shapes for cancelFulfillmentOrder
 * Each shape is a pure adapter from the canonical order id to one of the
 * conventions a Selling Partner client accepts. They are tried in order; a
 * client rejects an unsupported shape before any request leaves the process.
 */

import type { OperationCall } from '../models/service-interfaces.js';

export interface CancelCallShape {
  name: string;
  toCall(orderId: string): OperationCall;
}

export const CANCEL_CALL_SHAPES: readonly CancelCallShape[] = [
  {
    name: 'current',
    toCall: (orderId) => ({
      endpoint: 'fulfillmentOutbound',
      operation: 'cancelFulfillmentOrder',
      path: { sellerFulfillmentOrderId: orderId },
    }),
  },
  {
    name: 'legacy',
    toCall: (orderId) => ({
      operation: 'fulfillmentOutbound.cancelFulfillmentOrder',
      path: { sellerFulfillmentOrderId: orderId },
    }),
  },
  {
    name: 'positional',
    toCall: (orderId) => ({
      apiPath: `/fba/outbound/2020-07-01/fulfillmentOrders/${encodeURIComponent(orderId)}/cancel`,
      method: 'PUT',
    }),
  },
];
