/**
 * Classifier Service
 * Asks a language model whether a ticket requests an order cancellation and
 * which order it refers to. Walks an ordered list of models and degrades to a
 * not_cancellation default when every model fails, so an unreliable provider
 * routes tickets to a human instead of cancelling anything.
 */

import {
  ModelUnavailableError,
  createLogger,
  getErrorMessage,
  type Logger,
} from '@cancel-triage/shared';
import type { Classification, ClassifierOutcome, Intent, Urgency } from '../../../types/index.js';
import type { IClassificationProvider, IClassifier } from '../models/service-interfaces.js';
import { extractText, parseJsonObject } from './response-parser.js';

export const CLASSIFIER_SYSTEM_PROMPT = `You are a precise CX triage helper.
Respond with ONLY a single JSON object (no prose, no code fences), with keys:
- intent: "cancel_order" | "not_cancellation"
- order_id: string or null  (if numeric like 91057, that's fine; do not invent)
- is_subscription_related: boolean
- urgency: "low" | "normal" | "high"
- rationale: short string
`;

/**
 * Tried in order after the configured override
 */
export const FALLBACK_MODELS: readonly string[] = [
  'claude-sonnet-4-20250514',
  'claude-3-7-sonnet-20250219',
  'claude-3-5-haiku-20241022',
  'claude-3-haiku-20240307',
];

export const DEFAULT_CLASSIFICATION: Classification = Object.freeze({
  intent: 'not_cancellation',
  order_id: null,
  is_subscription_related: false,
  urgency: 'normal',
  rationale: 'Classifier fallback.',
});

const INTENTS: readonly Intent[] = ['cancel_order', 'not_cancellation'];
const URGENCIES: readonly Urgency[] = ['low', 'normal', 'high'];

function pickEnum<T extends string>(value: unknown, allowed: readonly T[], fallback: T): T {
  if (typeof value !== 'string') {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  return allowed.find(option => option === normalized) ?? fallback;
}

function coerceOrderId(value: unknown): string | null {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  if (typeof value === 'string' && value.trim()) {
    return value.trim();
  }
  return null;
}

/**
 * Fill in defaults for missing or mistyped fields. Partial objects are accepted.
 */
export function toClassification(data: Record<string, unknown>): Classification {
  return Object.freeze({
    intent: pickEnum(data.intent, INTENTS, 'not_cancellation'),
    order_id: coerceOrderId(data.order_id),
    is_subscription_related: typeof data.is_subscription_related === 'boolean'
      ? data.is_subscription_related
      : false,
    urgency: pickEnum(data.urgency, URGENCIES, 'normal'),
    rationale: typeof data.rationale === 'string' ? data.rationale : '',
  });
}

export interface ClassifierOptions {
  /** Tried before the fallback list */
  modelOverride?: string;
  fallbackModels?: readonly string[];
  logger?: Logger;
}

export class ClassifierService implements IClassifier {
  private readonly models: string[];
  private readonly logger: Logger;

  /**
   * @param provider - null when no API key is configured; every call then returns the default
   */
  constructor(
    private readonly provider: IClassificationProvider | null,
    options: ClassifierOptions = {}
  ) {
    const candidates = [options.modelOverride?.trim() ?? '', ...(options.fallbackModels ?? FALLBACK_MODELS)];
    this.models = candidates.filter((model, index) => model && candidates.indexOf(model) === index);
    this.logger = options.logger ?? createLogger('Classifier');
  }

  getModels(): string[] {
    return [...this.models];
  }

  async classify(text: string): Promise<ClassifierOutcome> {
    if (!this.provider) {
      return this.fallback('No ANTHROPIC_API_KEY set.');
    }

    let lastError: string | null = null;

    for (const model of this.models) {
      try {
        const response = await this.provider.complete(CLASSIFIER_SYSTEM_PROMPT, text, model);
        const raw = extractText(response);
        if (!raw) {
          throw new Error('Empty text returned from model.');
        }

        const classification = toClassification(parseJsonObject(raw));
        this.logger.info(`classified with ${model}: ${classification.intent}`);
        return { kind: 'classified', classification, model };
      } catch (error) {
        lastError = error instanceof ModelUnavailableError
          ? `Model not found: ${model} (${error.message})`
          : `Anthropic error on ${model}: ${getErrorMessage(error)}`;
        this.logger.warn(lastError);
      }
    }

    return this.fallback(lastError ? `Classifier fallback: ${lastError}` : DEFAULT_CLASSIFICATION.rationale);
  }

  private fallback(reason: string): ClassifierOutcome {
    return {
      kind: 'fallback',
      classification: Object.freeze({ ...DEFAULT_CLASSIFICATION, rationale: reason }),
      reason,
    };
  }
}
