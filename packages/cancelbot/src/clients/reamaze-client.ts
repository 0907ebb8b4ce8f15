import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import {
  AuthenticationError,
  createApiError,
  createLogger,
  extractApiErrorDetails,
  ValidationError,
  type Logger,
  type OperationResult,
  type ReamazeConfig,
} from '@cancel-triage/shared';
import type { TicketContext } from '../types/index.js';
import type { ITicketingClient } from '../services/triage/models/service-interfaces.js';

const messageSchema = z.object({
  body: z.string().nullish(),
  body_text: z.string().nullish(),
  plain_body: z.string().nullish(),
});

const conversationSchema = z.object({
  slug: z.string().min(1),
  subject: z.string().nullish(),
  messages: z.array(messageSchema).nullish(),
});

const conversationResponseSchema = z.object({ conversation: conversationSchema.nullish() });
const conversationListSchema = z.object({ conversations: z.array(conversationSchema).nullish() });

export type ReamazeConversation = z.infer<typeof conversationSchema>;

export function toTicketContext(conversation: ReamazeConversation): TicketContext {
  const messages = conversation.messages ?? [];
  const latest = messages.length > 0 ? messages[messages.length - 1] : undefined;

  return Object.freeze({
    id: conversation.slug,
    subject: conversation.subject ?? '',
    message: latest?.body_text || latest?.plain_body || '',
  });
}

function describeBody(data: unknown): string {
  if (typeof data === 'string') {
    return data;
  }
  return data === undefined ? '' : JSON.stringify(data);
}

export class ReamazeClient implements ITicketingClient {
  private client: AxiosInstance;
  private logger: Logger;

  constructor(private config: ReamazeConfig, client?: AxiosInstance, logger?: Logger) {
    this.client = client ?? axios.create({
      baseURL: `https://${config.brand}.reamaze.io/api/v1`,
      auth: {
        username: config.email,
        password: config.apiToken
      },
      headers: {
        'Accept': 'application/json',
        'Content-Type': 'application/json'
      },
      timeout: config.timeoutMs ?? 20000
    });
    this.logger = logger ?? createLogger('Re:amaze');
  }

  async fetchOneUnresolved(): Promise<TicketContext | null> {
    const slug = this.config.limitToSlug;

    try {
      if (slug) {
        const response = await this.client.get(`/conversations/${encodeURIComponent(slug)}.json`);
        const parsed = conversationResponseSchema.safeParse(response.data);
        if (!parsed.success) {
          throw new ValidationError(`Unexpected conversation payload for ${slug}: ${parsed.error.message}`);
        }
        return parsed.data.conversation ? toTicketContext(parsed.data.conversation) : null;
      }

      const response = await this.client.get('/conversations.json', {
        params: { brand: this.config.brand, state: 'unresolved', per_page: 1 }
      });
      const parsed = conversationListSchema.safeParse(response.data);
      if (!parsed.success) {
        throw new ValidationError(`Unexpected conversation list payload: ${parsed.error.message}`);
      }
      const first = parsed.data.conversations?.[0];
      return first ? toTicketContext(first) : null;
    } catch (error) {
      if (error instanceof ValidationError) {
        throw error;
      }

      const { statusCode } = extractApiErrorDetails(error);
      if (slug && statusCode === 404) {
        this.logger.warn(`Could not fetch slug: ${slug} (404)`);
        return null;
      }
      if (statusCode === 401 || statusCode === 403) {
        throw new AuthenticationError(
          `${statusCode} from Re:amaze. REAMAZE_EMAIL must be the account that generated the API token, and REAMAZE_BRAND must match the subdomain.`,
          error instanceof Error ? error : undefined
        );
      }
      throw createApiError(error, 'Failed to fetch conversation');
    }
  }

  async postPrivateNote(ticketId: string, text: string): Promise<OperationResult> {
    return this.mutate('post private note', () =>
      this.client.post(`/conversations/${encodeURIComponent(ticketId)}/messages.json`, {
        message: { body: text, private: true }
      })
    );
  }

  async addTags(ticketId: string, tags: string[]): Promise<OperationResult> {
    if (tags.length === 0) {
      return { ok: true, detail: 'no-op' };
    }
    return this.mutate('add tags', () =>
      this.client.post(`/conversations/${encodeURIComponent(ticketId)}/tags.json`, { tags })
    );
  }

  async assign(ticketId: string, assigneeName: string | null): Promise<OperationResult> {
    if (!assigneeName) {
      return { ok: true, detail: 'no-op' };
    }
    return this.mutate('assign conversation', () =>
      this.client.put(`/conversations/${encodeURIComponent(ticketId)}.json`, {
        conversation: { assignee_name: assigneeName }
      })
    );
  }

  /**
   * Ticket mutations report failure instead of throwing; the run carries on.
   */
  private async mutate(operation: string, request: () => Promise<{ data: unknown }>): Promise<OperationResult> {
    try {
      const response = await request();
      return { ok: true, detail: describeBody(response.data) };
    } catch (error) {
      const apiError = createApiError(error, `Failed to ${operation}`);
      this.logger.error(apiError.message);
      return { ok: false, detail: apiError.message };
    }
  }
}
