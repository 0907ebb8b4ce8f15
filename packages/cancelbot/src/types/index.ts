/**
 * Domain types for the cancellation triage pipeline
 */

import type { OperationResult } from '@cancel-triage/shared';

// ============================================
// Ticket
// ============================================

/**
 * One support conversation, reduced to what the pipeline reads
 */
export interface TicketContext {
  /** Conversation slug */
  readonly id: string;
  readonly subject: string;
  /** Body of the latest message */
  readonly message: string;
}

// ============================================
// Classification
// ============================================

export type Intent = 'cancel_order' | 'not_cancellation';

export type Urgency = 'low' | 'normal' | 'high';

/**
 * Field names follow the JSON the model is asked to produce; the same object
 * is printed into ticket notes and stored in the audit log.
 */
export interface Classification {
  readonly intent: Intent;
  /** Raw as extracted, not yet normalized */
  readonly order_id: string | null;
  readonly is_subscription_related: boolean;
  readonly urgency: Urgency;
  readonly rationale: string;
}

export type ClassifierOutcome =
  | { kind: 'classified'; classification: Classification; model: string }
  | { kind: 'fallback'; classification: Classification; reason: string };

// ============================================
// Fulfillment
// ============================================

export interface CancelPayload {
  operation: 'cancel_fulfillment_order';
  sellerFulfillmentOrderId: string;
  reasonCode: 'CustomerRequest';
  comment: string;
}

export type CancelFailureKind = 'setup' | 'provider' | 'signature' | 'unexpected';

export type CancelResult =
  | { ok: true; payload: unknown }
  | { ok: false; error: string; kind: CancelFailureKind };

// ============================================
// Decision
// ============================================

export type TerminalState =
  | 'noted_not_cancellation'
  | 'noted_missing_order_id'
  | 'noted_dry_run_simulated'
  | 'cancelled_success'
  | 'cancelled_failure';

/**
 * What the engine decides before anything is executed. `cancel` resolves to
 * cancelled_success or cancelled_failure once the fulfillment call returns.
 */
export type PlannedAction =
  | { kind: 'noted_not_cancellation' }
  | { kind: 'noted_missing_order_id' }
  | { kind: 'noted_dry_run_simulated'; orderId: string }
  | { kind: 'cancel'; orderId: string };

export type TagCategory = 'success' | 'failure' | 'not_cancellation';

export interface TriageRules {
  dryRun: boolean;
  assignee: string | null;
  tags: Record<TagCategory, string[]>;
}

export interface ActionOutcome {
  state: TerminalState;
  success: boolean;
  /** Structured result, stored as the audit record's result_json */
  detail: Record<string, unknown>;
}

export interface TicketUpdateResults {
  note: OperationResult;
  tags: OperationResult;
  assign: OperationResult;
}

export interface DecisionResult {
  outcome: ActionOutcome;
  ticketUpdates: TicketUpdateResults;
  auditId: number;
}

// ============================================
// Audit
// ============================================

export interface AuditEntry {
  ticketId: string;
  orderId: string | null;
  intent: Intent;
  success: boolean;
  result: Record<string, unknown>;
}

export interface AuditRecord extends AuditEntry {
  id: number;
  createdAt: string;
}

// ============================================
// Run
// ============================================

export type RunReport =
  | { status: 'no_ticket' }
  | { status: 'fetch_failed'; error: string }
  | {
      status: 'completed';
      ticketId: string;
      classifier: ClassifierOutcome;
      orderId: string | null;
      state: TerminalState;
      outcome: ActionOutcome;
      ticketUpdates: TicketUpdateResults;
      auditId: number;
    };
