/**
 * Connectivity check for the `check` command
 * Read-only unless a test note is requested: fetches one conversation and
 * calls a harmless Sellers operation to prove the LWA token exchange.
 */

import { createLogger, getErrorMessage, type Logger } from '@cancel-triage/shared';
import type { IFulfillmentClient, ITicketingClient } from './triage/models/service-interfaces.js';
import { unwrapPayload } from './triage/services/fulfillment.service.js';

export type CheckStatus = 'ok' | 'failed' | 'skipped';

export interface CheckStep {
  name: 'ticketing' | 'ticketing_write' | 'sp_api';
  status: CheckStatus;
  detail: string;
}

export interface ConnectionReport {
  ok: boolean;
  steps: CheckStep[];
}

export interface ConnectionCheckOptions {
  ticketing: ITicketingClient;
  /** null when the SP-API credential bundle is incomplete */
  createFulfillmentClient: (() => IFulfillmentClient) | null;
  /** Names of the missing SP-API variables, for the skip message */
  spApiMissing?: string[];
  /** Post a private test note on the fetched conversation */
  writeNote?: boolean;
  logger?: Logger;
}

export const TEST_NOTE = '[Cancelbot] Connectivity check (safe test note).';

const MAX_DETAIL_LENGTH = 2000;

export async function runConnectionCheck(options: ConnectionCheckOptions): Promise<ConnectionReport> {
  const logger = options.logger ?? createLogger('Check');
  const steps: CheckStep[] = [];

  let ticketId: string | null = null;
  try {
    const ticket = await options.ticketing.fetchOneUnresolved();
    if (ticket) {
      ticketId = ticket.id;
      steps.push({ name: 'ticketing', status: 'ok', detail: `slug=${ticket.id} subject=${JSON.stringify(ticket.subject)}` });
    } else {
      steps.push({ name: 'ticketing', status: 'ok', detail: 'no unresolved conversation' });
    }
  } catch (error) {
    logger.error(`ticketing check failed: ${getErrorMessage(error)}`);
    steps.push({ name: 'ticketing', status: 'failed', detail: getErrorMessage(error) });
  }

  if (options.writeNote) {
    if (ticketId) {
      const result = await options.ticketing.postPrivateNote(ticketId, TEST_NOTE);
      steps.push({ name: 'ticketing_write', status: result.ok ? 'ok' : 'failed', detail: result.ok ? `note posted on ${ticketId}` : result.detail });
    } else {
      steps.push({ name: 'ticketing_write', status: 'skipped', detail: 'no conversation to write to' });
    }
  }

  if (options.createFulfillmentClient) {
    try {
      const client = options.createFulfillmentClient();
      const response = await client.callOperation({ endpoint: 'sellers', operation: 'getMarketplaceParticipations' });
      steps.push({
        name: 'sp_api',
        status: 'ok',
        detail: JSON.stringify(unwrapPayload(response) ?? null, null, 2).slice(0, MAX_DETAIL_LENGTH),
      });
    } catch (error) {
      logger.error(`SP-API check failed: ${getErrorMessage(error)}`);
      steps.push({ name: 'sp_api', status: 'failed', detail: getErrorMessage(error) });
    }
  } else {
    const missing = options.spApiMissing?.length ? options.spApiMissing.join(', ') : 'credentials';
    steps.push({ name: 'sp_api', status: 'skipped', detail: `missing ${missing}` });
  }

  return { ok: steps.every(step => step.status !== 'failed'), steps };
}

export function formatConnectionReport(report: ConnectionReport): string {
  const icons: Record<CheckStatus, string> = { ok: '✅', failed: '❌', skipped: '⏭️' };
  return report.steps
    .map(step => `${icons[step.status]} ${step.name}: ${step.detail}`)
    .join('\n');
}
