/**
 * Composition root
 * Builds every component from an AppConfig. Entry points (CLI, MCP server)
 * call createTriageApp() once and share the result.
 */

import { ConfigurationError, createLogger, type Logger } from '@cancel-triage/shared';
import type { AppConfig } from './config.js';
import { AnthropicProvider } from './clients/anthropic-provider.js';
import { ReamazeClient } from './clients/reamaze-client.js';
import { SpApiClient } from './clients/sp-api-client.js';
import { TriagePipeline, type TraceFn } from './services/triage/pipeline/triage.pipeline.js';
import { SqliteAuditLogger } from './services/triage/services/audit-logger.service.js';
import { CANCEL_CALL_SHAPES } from './services/triage/services/call-shapes.js';
import { ClassifierService } from './services/triage/services/classifier.service.js';
import { DecisionEngine } from './services/triage/services/decision-engine.service.js';
import { FulfillmentService } from './services/triage/services/fulfillment.service.js';

export interface TriageApp {
  config: AppConfig;
  ticketing: ReamazeClient;
  classifier: ClassifierService;
  fulfillment: FulfillmentService;
  audit: SqliteAuditLogger;
  engine: DecisionEngine;
  pipeline: TriagePipeline;
  /** Builds a fresh SP-API client; throws ConfigurationError without credentials */
  createSpApiClient(): SpApiClient;
  close(): Promise<void>;
}

export interface CreateTriageAppOptions {
  trace?: TraceFn;
  logger?: Logger;
}

/**
 * @throws ConfigurationError when the ticketing credentials are missing
 */
export async function createTriageApp(
  config: AppConfig,
  options: CreateTriageAppOptions = {}
): Promise<TriageApp> {
  if (!config.reamaze) {
    throw new ConfigurationError(`Missing Re:amaze configuration: ${config.reamazeMissing.join(', ')}`);
  }

  const logger = options.logger ?? createLogger('Cancelbot');
  if (!config.rulesFound) {
    logger.warn(`rules file ${config.rulesPath} not found, running with defaults (dry run, no tags)`);
  }

  const ticketing = new ReamazeClient(config.reamaze, undefined, options.logger);

  const provider = config.anthropic.apiKey
    ? new AnthropicProvider(config.anthropic.apiKey, { logger: options.logger })
    : null;
  const classifier = new ClassifierService(provider, {
    modelOverride: config.anthropic.modelOverride,
    logger: options.logger,
  });

  const createSpApiClient = (): SpApiClient => new SpApiClient(config.spApi, undefined, options.logger);
  const fulfillment = new FulfillmentService(createSpApiClient, CANCEL_CALL_SHAPES, options.logger);

  const audit = new SqliteAuditLogger(config.dbPath, options.logger);
  await audit.init();

  const engine = new DecisionEngine(ticketing, fulfillment, audit, config.rules, options.logger);
  const pipeline = new TriagePipeline(ticketing, classifier, engine, {
    trace: options.trace,
    logger: options.logger,
  });

  return {
    config,
    ticketing,
    classifier,
    fulfillment,
    audit,
    engine,
    pipeline,
    createSpApiClient,
    close: () => audit.close(),
  };
}
