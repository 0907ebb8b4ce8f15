/**
 * Run report helpers for the CLI
 */

import type { RunReport, TerminalState } from '../types/index.js';

export const EXIT_CODES = {
  handled: 0,
  failure: 1,
  noTicket: 2,
  needsHuman: 3,
  ticketingUnreachable: 4,
} as const;

const NEEDS_HUMAN: ReadonlySet<TerminalState> = new Set<TerminalState>([
  'noted_missing_order_id',
  'cancelled_failure',
]);

export function exitCodeFor(report: RunReport): number {
  switch (report.status) {
    case 'no_ticket':
      return EXIT_CODES.noTicket;
    case 'fetch_failed':
      return EXIT_CODES.ticketingUnreachable;
    case 'completed':
      return NEEDS_HUMAN.has(report.state) ? EXIT_CODES.needsHuman : EXIT_CODES.handled;
  }
}

/**
 * One-screen summary printed at the end of a run
 */
export function formatRunReport(report: RunReport): string {
  switch (report.status) {
    case 'no_ticket':
      return 'No ticket processed.';
    case 'fetch_failed':
      return `Run aborted: could not fetch a ticket (${report.error})`;
    case 'completed': {
      const { ticketUpdates } = report;
      const lines = [
        `Ticket:   ${report.ticketId}`,
        `Intent:   ${report.classifier.classification.intent}`,
        `Order id: ${report.orderId ?? '(none)'}`,
        `State:    ${report.state}`,
        `Success:  ${report.outcome.success}`,
        `Note:     ${ticketUpdates.note.ok ? 'ok' : `failed (${ticketUpdates.note.detail})`}`,
        `Tags:     ${ticketUpdates.tags.ok ? 'ok' : `failed (${ticketUpdates.tags.detail})`}`,
        `Assign:   ${ticketUpdates.assign.ok ? 'ok' : `failed (${ticketUpdates.assign.detail})`}`,
        `Audit:    #${report.auditId}`,
      ];
      if (report.classifier.kind === 'fallback') {
        lines.splice(2, 0, `Fallback: ${report.classifier.reason}`);
      }
      return lines.join('\n');
    }
  }
}
