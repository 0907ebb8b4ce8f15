/**
 * @cancel-triage/cancelbot
 * Public surface for embedding the triage pipeline
 */

export * from './types/index.js';
export type {
  ITicketingClient,
  IClassificationProvider,
  IClassifier,
  IFulfillmentClient,
  IFulfillmentAdapter,
  IAuditLogger,
  OperationCall,
  ProviderResponse,
} from './services/triage/models/service-interfaces.js';

export { loadAppConfig, loadRules, parseRules, describeConfig, DEFAULT_RULES, type AppConfig } from './config.js';
export { createTriageApp, type TriageApp, type CreateTriageAppOptions } from './app.js';

export { ReamazeClient, toTicketContext } from './clients/reamaze-client.js';
export { AnthropicProvider, type AnthropicProviderOptions } from './clients/anthropic-provider.js';
export { SpApiClient, OPERATIONS, resolveOperationCall } from './clients/sp-api-client.js';

export { TriagePipeline, buildClassifierInput, type TriagePipelineOptions } from './services/triage/pipeline/triage.pipeline.js';
export { ClassifierService, FALLBACK_MODELS, DEFAULT_CLASSIFICATION, toClassification } from './services/triage/services/classifier.service.js';
export { normalizeOrderId } from './services/triage/services/order-id.service.js';
export { FulfillmentService, buildCancelPayload } from './services/triage/services/fulfillment.service.js';
export { CANCEL_CALL_SHAPES, type CancelCallShape } from './services/triage/services/call-shapes.js';
export { DecisionEngine, STATE_TABLE, selectAction, resolveCancellation } from './services/triage/services/decision-engine.service.js';
export { SqliteAuditLogger } from './services/triage/services/audit-logger.service.js';
export { runConnectionCheck, type ConnectionReport } from './services/connection-check.js';
export { exitCodeFor, formatRunReport, EXIT_CODES } from './utils/run-report.js';
