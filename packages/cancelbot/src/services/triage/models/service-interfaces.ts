/**
 * Service interfaces for the triage pipeline
 * Defines contracts for every collaborator the pipeline talks to
 */

import type { OperationResult } from '@cancel-triage/shared';
import type {
  AuditEntry,
  AuditRecord,
  CancelPayload,
  CancelResult,
  ClassifierOutcome,
  TicketContext,
} from '../../../types/index.js';

export interface ITicketingClient {
  /**
   * Fetch one unresolved ticket. Resolves null when there is nothing to do,
   * rejects when the ticketing system cannot be reached.
   */
  fetchOneUnresolved(): Promise<TicketContext | null>;

  postPrivateNote(ticketId: string, text: string): Promise<OperationResult>;

  /**
   * An empty tag list is a no-op that succeeds without a request
   */
  addTags(ticketId: string, tags: string[]): Promise<OperationResult>;

  /**
   * A null assignee is a no-op that succeeds without a request
   */
  assign(ticketId: string, assigneeName: string | null): Promise<OperationResult>;
}

/**
 * One typed segment of a model response
 */
export interface ProviderContentBlock {
  type: string;
  text?: string;
}

export interface ProviderResponse {
  content: ProviderContentBlock[];
}

export interface IClassificationProvider {
  /**
   * @throws ModelUnavailableError when the provider does not know `model`
   */
  complete(systemInstruction: string, userText: string, model: string): Promise<ProviderResponse>;
}

export interface IClassifier {
  /**
   * Never rejects. Provider failures surface as a `fallback` outcome.
   */
  classify(text: string): Promise<ClassifierOutcome>;
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH';

/**
 * A call addressed by operation name, e.g.
 * `{ endpoint: 'fulfillmentOutbound', operation: 'cancelFulfillmentOrder' }`
 * or the dotted `{ operation: 'fulfillmentOutbound.cancelFulfillmentOrder' }`.
 */
export interface NamedOperationCall {
  operation: string;
  endpoint?: string;
  path?: Record<string, string>;
  query?: Record<string, string>;
  body?: unknown;
}

/**
 * A call addressed by raw API path
 */
export interface RawPathCall {
  apiPath: string;
  method: HttpMethod;
  query?: Record<string, string>;
  body?: unknown;
}

export type OperationCall = NamedOperationCall | RawPathCall;

export interface IFulfillmentClient {
  /**
   * @throws SignatureMismatchError before sending anything when the call shape is not supported
   * @throws AuthenticationError when credentials are rejected
   * @throws ApiError when the provider answers with an error
   */
  callOperation(call: OperationCall): Promise<unknown>;
}

export interface IFulfillmentAdapter {
  buildCancelPayload(orderId: string): CancelPayload;

  /**
   * Never rejects; one attempt, no retries.
   */
  cancel(orderId: string): Promise<CancelResult>;
}

export interface IAuditLogger {
  log(entry: AuditEntry): Promise<number>;
  listRecent(limit: number): Promise<AuditRecord[]>;
}
