#!/usr/bin/env node

/**
 * Cancelbot MCP Server
 * Exposes the triage pipeline and its building blocks as MCP tools over stdio
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema, type Tool } from '@modelcontextprotocol/sdk/types.js';
import {
  MethodNotFoundError,
  createLogger,
  loadEnv,
  withErrorHandling,
  type MCPResponse,
} from '@cancel-triage/shared';

import { createTriageApp, type TriageApp } from './app.js';
import { describeConfig, loadAppConfig } from './config.js';
import { TriageHandler } from './handlers/triage.js';

const logger = createLogger('Cancelbot MCP');

export const TOOLS: Tool[] = [
  {
    name: 'triage_next_ticket',
    description: 'Fetch the next unresolved ticket, classify it and act on it (note, tags, assignment, audit record). Cancels the order for real only when dry_run is off in the rules file.',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  },
  {
    name: 'classify_message',
    description: 'Classify a customer message as a cancellation request or not, and extract the order id',
    inputSchema: {
      type: 'object',
      properties: {
        message: { type: 'string', description: 'Customer message body' },
        subject: { type: 'string', description: 'Optional: ticket subject, prepended to the message' },
      },
      required: ['message'],
    },
  },
  {
    name: 'normalize_order_id',
    description: 'Normalize an order id to the seller fulfillment order id format (e.g. 91057 → "Shopify #91057.1")',
    inputSchema: {
      type: 'object',
      properties: {
        order_id: { type: 'string', description: 'Order id as written by the customer' },
      },
      required: ['order_id'],
    },
  },
  {
    name: 'preview_cancel_payload',
    description: 'Show the cancellation payload that would be sent for an order id, without calling the fulfillment API',
    inputSchema: {
      type: 'object',
      properties: {
        order_id: { type: 'string', description: 'Order id, normalized before building the payload' },
      },
      required: ['order_id'],
    },
  },
  {
    name: 'list_recent_actions',
    description: 'List the most recent audit records, newest first',
    inputSchema: {
      type: 'object',
      properties: {
        limit: { type: 'number', description: 'Number of records to return (1-100)', default: 10 },
      },
    },
  },
];

export class CancelbotMCPServer {
  private server: Server;

  constructor(private handler: TriageHandler) {
    this.server = new Server(
      {
        name: 'cancelbot-mcp-server',
        version: '1.0.0',
      },
      {
        capabilities: { tools: {} },
      }
    );

    this.setupHandlers();
  }

  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;
      return withErrorHandling(() => this.callTool(name, args));
    });
  }

  private async callTool(name: string, args: unknown): Promise<MCPResponse> {
    switch (name) {
      case 'triage_next_ticket':
        return this.handler.triageNextTicket();
      case 'classify_message':
        return this.handler.classifyMessage(args);
      case 'normalize_order_id':
        return this.handler.normalizeOrderId(args);
      case 'preview_cancel_payload':
        return this.handler.previewCancelPayload(args);
      case 'list_recent_actions':
        return this.handler.listRecentActions(args);

      default:
        throw new MethodNotFoundError(name);
    }
  }

  async run(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    logger.info('Cancelbot MCP server running on stdio');
  }
}

async function main(): Promise<void> {
  loadEnv();
  const config = loadAppConfig();
  logger.info(`config ${describeConfig(config)}`);

  // Progress trace goes to stderr; stdout belongs to the transport
  const app: TriageApp = await createTriageApp(config, { trace: (line) => logger.info(line) });
  const handler = new TriageHandler(app.pipeline, app.classifier, app.fulfillment, app.audit);

  const shutdown = (): void => {
    app.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('failed to close audit database', error);
        process.exit(1);
      }
    );
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await new CancelbotMCPServer(handler).run();
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error('fatal', error);
    process.exit(1);
  });
}
