/**
 * Triage Operations Handler
 * Handles triage_next_ticket, classify_message, normalize_order_id,
 * preview_cancel_payload, list_recent_actions
 */

import { z } from 'zod';
import { McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import type { MCPResponse } from '@cancel-triage/shared';
import { BaseHandler } from './base-handler.js';
import type { TriagePipeline } from '../services/triage/pipeline/triage.pipeline.js';
import { buildClassifierInput } from '../services/triage/pipeline/triage.pipeline.js';
import type {
  IAuditLogger,
  IClassifier,
  IFulfillmentAdapter,
} from '../services/triage/models/service-interfaces.js';
import { normalizeOrderId } from '../services/triage/services/order-id.service.js';

const classifyArgsSchema = z.object({
  message: z.string(),
  subject: z.string().optional(),
});

const orderIdArgsSchema = z.object({
  order_id: z.union([z.string(), z.number()]).transform(value => String(value)),
});

const listArgsSchema = z.object({
  limit: z.number().int().min(1).max(100).optional(),
});

export const DEFAULT_LIST_LIMIT = 10;

export class TriageHandler extends BaseHandler {
  constructor(
    private pipeline: Pick<TriagePipeline, 'runOnce'>,
    private classifier: IClassifier,
    private fulfillment: IFulfillmentAdapter,
    private audit: IAuditLogger
  ) {
    super();
  }

  /**
   * Runs the full pipeline once. Writes to the ticket and the audit log, and
   * cancels for real when the rules file turns dry run off.
   */
  async triageNextTicket(): Promise<MCPResponse> {
    try {
      const report = await this.pipeline.runOnce();
      return this.formatJson(report);
    } catch (error) {
      this.handleError(error, 'triage next ticket');
    }
  }

  async classifyMessage(args: unknown): Promise<MCPResponse> {
    const { message, subject } = this.parseArgs(classifyArgsSchema, args);
    const text = subject === undefined
      ? message
      : buildClassifierInput({ id: '', subject, message });

    try {
      const outcome = await this.classifier.classify(text);
      const rawOrderId = outcome.classification.order_id;
      return this.formatJson({
        ...outcome,
        normalized_order_id: rawOrderId ? normalizeOrderId(rawOrderId) || null : null,
      });
    } catch (error) {
      this.handleError(error, 'classify message');
    }
  }

  async normalizeOrderId(args: unknown): Promise<MCPResponse> {
    const { order_id } = this.parseArgs(orderIdArgsSchema, args);
    return this.formatResponse(normalizeOrderId(order_id));
  }

  async previewCancelPayload(args: unknown): Promise<MCPResponse> {
    const { order_id } = this.parseArgs(orderIdArgsSchema, args);
    const normalized = normalizeOrderId(order_id);
    if (!normalized) {
      throw new McpError(ErrorCode.InvalidParams, 'order_id is empty after normalization');
    }
    return this.formatJson(this.fulfillment.buildCancelPayload(normalized));
  }

  async listRecentActions(args: unknown): Promise<MCPResponse> {
    const { limit } = this.parseArgs(listArgsSchema, args);

    try {
      const records = await this.audit.listRecent(limit ?? DEFAULT_LIST_LIMIT);
      if (records.length === 0) {
        return this.formatResponse('No recorded actions.');
      }
      return this.formatJson(records);
    } catch (error) {
      this.handleError(error, 'list recent actions');
    }
  }
}
