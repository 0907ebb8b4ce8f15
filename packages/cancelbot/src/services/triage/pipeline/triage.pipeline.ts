/**
 * Triage Pipeline
 * Main orchestrator for one run:
 * Fetch ticket → Classify → Normalize order id → Decide & act → Audit
 */

import { createLogger, getErrorMessage, type Logger } from '@cancel-triage/shared';
import type { RunReport, TicketContext } from '../../../types/index.js';
import type { IClassifier, ITicketingClient } from '../models/service-interfaces.js';
import type { DecisionEngine } from '../services/decision-engine.service.js';
import { normalizeOrderId } from '../services/order-id.service.js';

export type TraceFn = (line: string) => void;

export interface TriagePipelineOptions {
  logger?: Logger;
  /** Receives the human-readable progress trace */
  trace?: TraceFn;
}

/**
 * Subject and latest message, or the subject alone when there is no message
 */
export function buildClassifierInput(ticket: TicketContext): string {
  return `${ticket.subject}\n\n${ticket.message}`.trim() || ticket.subject;
}

export class TriagePipeline {
  private logger: Logger;
  private trace: TraceFn;

  constructor(
    private ticketing: ITicketingClient,
    private classifier: IClassifier,
    private engine: Pick<DecisionEngine, 'execute'>,
    options: TriagePipelineOptions = {}
  ) {
    this.logger = options.logger ?? createLogger('Pipeline');
    this.trace = options.trace ?? (() => undefined);
  }

  /**
   * Process at most one ticket start to finish.
   * Only a failing fetch or a failing audit write ends the run early; the
   * former is reported, the latter rejects.
   */
  async runOnce(): Promise<RunReport> {
    const startTime = Date.now();

    // Step 1: fetch
    let ticket: TicketContext | null;
    try {
      ticket = await this.ticketing.fetchOneUnresolved();
    } catch (error) {
      const message = getErrorMessage(error);
      this.logger.error(`ticket fetch failed: ${message}`);
      this.trace(`Ticketing unreachable: ${message}`);
      return { status: 'fetch_failed', error: message };
    }

    if (!ticket) {
      this.trace('No unresolved tickets.');
      return { status: 'no_ticket' };
    }
    this.trace(`Ticket ${ticket.id}: ${ticket.subject}`);

    // Step 2: classify
    const classifier = await this.classifier.classify(buildClassifierInput(ticket));
    const { classification } = classifier;
    this.trace(
      classifier.kind === 'classified'
        ? `Classified by ${classifier.model}: ${classification.intent}`
        : `Classifier fallback: ${classifier.reason}`
    );

    // Step 3: normalize
    const orderId = classification.order_id ? normalizeOrderId(classification.order_id) || null : null;
    this.trace(`Order id: ${orderId ?? '(none)'}`);

    // Step 4: decide, act, audit
    const { outcome, ticketUpdates, auditId } = await this.engine.execute(ticket, classification, orderId);
    this.trace(`Outcome: ${outcome.state} (success=${outcome.success}, audit #${auditId})`);

    this.logger.info(`ticket ${ticket.id} processed in ${Date.now() - startTime}ms`);

    return {
      status: 'completed',
      ticketId: ticket.id,
      classifier,
      orderId,
      state: outcome.state,
      outcome,
      ticketUpdates,
      auditId,
    };
  }
}
