/**
 * Private note templates, one per terminal state
 */

import type { Classification } from '../../../types/index.js';

export interface NoteContext {
  classification: Classification;
  orderId: string | null;
  /** Dry-run payload or the provider's response payload */
  payload?: unknown;
  error?: string;
}

function json(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

export function notCancellationNote({ classification }: NoteContext): string {
  return (
    '[Cancelbot] Not a cancellation based on classifier.\n\n' +
    `Classifier JSON:\n\`\`\`json\n${json(classification)}\n\`\`\``
  );
}

export function missingOrderIdNote(_context: NoteContext): string {
  return (
    '[Cancelbot] Cancellation intent detected but no order id found.\n' +
    'Tagged needs-human and assigned.'
  );
}

export function dryRunNote({ classification, payload }: NoteContext): string {
  return (
    '✅ [DRY RUN] Classified as cancellation.\n' +
    'No fulfillment call made. Here is the payload that WOULD be sent:\n\n' +
    `\`\`\`json\n${json(payload)}\n\`\`\`\n` +
    `Classifier: ${json(classification)}`
  );
}

export function cancelSuccessNote({ orderId, payload }: NoteContext): string {
  return (
    `✅ Auto-cancel success via SP-API for \`${orderId}\`.\n\n` +
    `Response:\n\`\`\`json\n${json(payload)}\n\`\`\``
  );
}

export function cancelFailureNote({ orderId, error }: NoteContext): string {
  return (
    `⚠️ Auto-cancel failed for \`${orderId}\`.\n\n` +
    `Error:\n\`\`\`\n${error ?? 'unknown error'}\n\`\`\`\nTagged needs-human.`
  );
}
