/**
 * Decision Engine
 * Maps a classification and a normalized order id to exactly one terminal
 * state, applies the ticket updates for that state and writes one audit record.
 */

import { createLogger, type Logger, type OperationResult } from '@cancel-triage/shared';
import type {
  ActionOutcome,
  CancelResult,
  Classification,
  DecisionResult,
  Intent,
  PlannedAction,
  TagCategory,
  TerminalState,
  TicketContext,
  TicketUpdateResults,
  TriageRules,
} from '../../../types/index.js';
import type {
  IAuditLogger,
  IFulfillmentAdapter,
  ITicketingClient,
} from '../models/service-interfaces.js';
import {
  cancelFailureNote,
  cancelSuccessNote,
  dryRunNote,
  missingOrderIdNote,
  notCancellationNote,
  type NoteContext,
} from './ticket-notes.js';

interface StateRule {
  tagCategory: TagCategory;
  auditIntent: Intent;
  note: (context: NoteContext) => string;
  /** Audit success flag, given whether the private note was posted */
  auditSuccess: (notePosted: boolean) => boolean;
}

export const STATE_TABLE: Readonly<Record<TerminalState, StateRule>> = {
  noted_not_cancellation: {
    tagCategory: 'not_cancellation',
    auditIntent: 'not_cancellation',
    note: notCancellationNote,
    auditSuccess: (notePosted) => notePosted,
  },
  noted_missing_order_id: {
    tagCategory: 'failure',
    auditIntent: 'cancel_order',
    note: missingOrderIdNote,
    auditSuccess: () => false,
  },
  noted_dry_run_simulated: {
    tagCategory: 'success',
    auditIntent: 'cancel_order',
    note: dryRunNote,
    auditSuccess: () => true,
  },
  cancelled_success: {
    tagCategory: 'success',
    auditIntent: 'cancel_order',
    note: cancelSuccessNote,
    auditSuccess: () => true,
  },
  cancelled_failure: {
    tagCategory: 'failure',
    auditIntent: 'cancel_order',
    note: cancelFailureNote,
    auditSuccess: () => false,
  },
};

/**
 * Pure decision: which path does this ticket take?
 */
export function selectAction(
  classification: Classification,
  orderId: string | null,
  dryRun: boolean
): PlannedAction {
  if (classification.intent !== 'cancel_order') {
    return { kind: 'noted_not_cancellation' };
  }
  if (!orderId) {
    return { kind: 'noted_missing_order_id' };
  }
  return dryRun ? { kind: 'noted_dry_run_simulated', orderId } : { kind: 'cancel', orderId };
}

export function resolveCancellation(result: CancelResult): TerminalState {
  return result.ok ? 'cancelled_success' : 'cancelled_failure';
}

/**
 * Terminal state plus what the note and the audit record need to say about it
 */
interface ExecutedAction {
  state: TerminalState;
  note: NoteContext;
  detail: Record<string, unknown>;
}

export class DecisionEngine {
  private logger: Logger;

  constructor(
    private ticketing: Pick<ITicketingClient, 'postPrivateNote' | 'addTags' | 'assign'>,
    private fulfillment: IFulfillmentAdapter,
    private audit: IAuditLogger,
    private rules: TriageRules,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('Decision');
  }

  /**
   * Ticket updates are best effort and never abort the run; a failing audit
   * write does, since an unrecorded action must not look handled.
   */
  async execute(
    ticket: TicketContext,
    classification: Classification,
    orderId: string | null
  ): Promise<DecisionResult> {
    const plan = selectAction(classification, orderId, this.rules.dryRun);
    this.logger.info(`ticket ${ticket.id}: planned ${plan.kind}`);

    const executed = await this.perform(plan, classification, orderId);
    const rule = STATE_TABLE[executed.state];

    const ticketUpdates = await this.updateTicket(ticket.id, rule, executed);

    const outcome: ActionOutcome = {
      state: executed.state,
      success: rule.auditSuccess(ticketUpdates.note.ok),
      detail: executed.detail,
    };

    const auditId = await this.audit.log({
      ticketId: ticket.id,
      orderId,
      intent: rule.auditIntent,
      success: outcome.success,
      result: outcome.detail,
    });

    this.logger.info(`ticket ${ticket.id}: ${outcome.state} (audit #${auditId})`);
    return { outcome, ticketUpdates, auditId };
  }

  private async perform(
    plan: PlannedAction,
    classification: Classification,
    orderId: string | null
  ): Promise<ExecutedAction> {
    switch (plan.kind) {
      case 'noted_not_cancellation':
        return {
          state: 'noted_not_cancellation',
          note: { classification, orderId },
          detail: { classifier: classification },
        };

      case 'noted_missing_order_id':
        return {
          state: 'noted_missing_order_id',
          note: { classification, orderId },
          detail: { error: 'missing_order_id', classifier: classification },
        };

      case 'noted_dry_run_simulated': {
        const payload = this.fulfillment.buildCancelPayload(plan.orderId);
        return {
          state: 'noted_dry_run_simulated',
          note: { classification, orderId: plan.orderId, payload },
          detail: { dry_run: true, payload, classifier: classification },
        };
      }

      case 'cancel': {
        const result = await this.fulfillment.cancel(plan.orderId);
        const state = resolveCancellation(result);
        if (result.ok) {
          return {
            state,
            note: { classification, orderId: plan.orderId, payload: result.payload },
            detail: { ok: true, payload: result.payload },
          };
        }
        return {
          state,
          note: { classification, orderId: plan.orderId, error: result.error },
          detail: { ok: false, error: result.error, kind: result.kind },
        };
      }
    }
  }

  private async updateTicket(
    ticketId: string,
    rule: StateRule,
    executed: ExecutedAction
  ): Promise<TicketUpdateResults> {
    const note = await this.ticketing.postPrivateNote(ticketId, rule.note(executed.note));
    this.warnOnFailure('post note', ticketId, note);

    const tags = await this.ticketing.addTags(ticketId, this.rules.tags[rule.tagCategory]);
    this.warnOnFailure('add tags', ticketId, tags);

    const assign = await this.ticketing.assign(ticketId, this.rules.assignee);
    this.warnOnFailure('assign', ticketId, assign);

    return { note, tags, assign };
  }

  private warnOnFailure(step: string, ticketId: string, result: OperationResult): void {
    if (!result.ok) {
      this.logger.warn(`could not ${step} on ticket ${ticketId}: ${result.detail}`);
    }
  }
}
