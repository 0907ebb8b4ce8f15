/**
 * Application configuration
 * Built once at startup from the environment and the rules file, then passed
 * into every component constructor. Nothing below the entry points reads
 * process.env.
 */

import fs from 'fs';
import path from 'path';
import { parse } from 'yaml';
import { z } from 'zod';
import {
  ConfigurationError,
  getEnv,
  getEnvFlag,
  type AnthropicConfig,
  type EnvSource,
  type ReamazeConfig,
  type SpApiConfig,
  type SpApiCredentials,
  type SpApiRegion,
} from '@cancel-triage/shared';
import { ignoredAwsSettings } from './clients/sp-api-client.js';
import type { TriageRules } from './types/index.js';

export interface AppConfig {
  rules: TriageRules;
  /** Absolute path of the rules file and whether it existed */
  rulesPath: string;
  rulesFound: boolean;
  anthropic: AnthropicConfig;
  /** null when any Re:amaze variable is missing */
  reamaze: ReamazeConfig | null;
  reamazeMissing: string[];
  spApi: SpApiConfig;
  /** Absolute path of the SQLite audit database */
  dbPath: string;
  /** `check` posts a test note when set */
  reamazeWrite: boolean;
}

export const DEFAULT_RULES: TriageRules = {
  dryRun: true,
  assignee: null,
  tags: { success: [], failure: [], not_cancellation: [] },
};

const tagListSchema = z
  .array(z.string())
  .nullish()
  .transform(tags => (tags ?? []).map(tag => tag.trim()).filter(tag => tag.length > 0));

const rulesFileSchema = z.object({
  dry_run: z.boolean().nullish().transform(value => value ?? true),
  assignee: z
    .string()
    .nullish()
    .transform(value => (value && value.trim()) || null),
  tags: z
    .object({
      success: tagListSchema,
      failure: tagListSchema,
      not_cancellation: tagListSchema,
    })
    .nullish(),
});

/**
 * Parse rules YAML. Empty documents give the defaults; anything that does not
 * match the schema is a ConfigurationError.
 */
export function parseRules(source: string, origin: string = 'rules file'): TriageRules {
  let document: unknown;
  try {
    document = parse(source);
  } catch (error) {
    throw new ConfigurationError(
      `Invalid YAML in ${origin}`,
      error instanceof Error ? error : undefined
    );
  }

  const result = rulesFileSchema.safeParse(document ?? {});
  if (!result.success) {
    const problems = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid ${origin}: ${problems}`);
  }

  const { dry_run, assignee, tags } = result.data;
  return {
    dryRun: dry_run,
    assignee,
    tags: {
      success: tags?.success ?? [],
      failure: tags?.failure ?? [],
      not_cancellation: tags?.not_cancellation ?? [],
    },
  };
}

/**
 * Load the rules file. A missing file is not an error: it means dry run with no tags.
 */
export function loadRules(filePath: string): { rules: TriageRules; found: boolean } {
  if (!fs.existsSync(filePath)) {
    return { rules: DEFAULT_RULES, found: false };
  }
  return { rules: parseRules(fs.readFileSync(filePath, 'utf8'), filePath), found: true };
}

function loadReamazeConfig(env: EnvSource): { config: ReamazeConfig | null; missing: string[] } {
  const brand = getEnv('REAMAZE_BRAND', '', env);
  const email = getEnv('REAMAZE_EMAIL', '', env);
  const apiToken = getEnv('REAMAZE_API_TOKEN', '', env);

  const fields: Array<[string, string]> = [
    ['REAMAZE_BRAND', brand],
    ['REAMAZE_EMAIL', email],
    ['REAMAZE_API_TOKEN', apiToken],
  ];
  const missing = fields.filter(([, value]) => !value).map(([name]) => name);

  if (missing.length > 0) {
    return { config: null, missing };
  }

  return {
    config: {
      brand,
      email,
      apiToken,
      limitToSlug: getEnv('LIMIT_TO_CONVO', '', env) || undefined,
    },
    missing,
  };
}

const REGIONS: readonly SpApiRegion[] = ['NA', 'EU', 'FE'];

function parseRegion(value: string): SpApiRegion {
  const upper = value.toUpperCase();
  const region = REGIONS.find(r => r === upper);
  if (!region) {
    throw new ConfigurationError(`SPAPI_REGION must be one of ${REGIONS.join(', ')}, got "${value}"`);
  }
  return region;
}

function loadSpApiConfig(env: EnvSource): SpApiConfig {
  const refreshToken = getEnv('REFRESH_TOKEN', '', env);
  const appId = getEnv('LWA_CLIENT_ID', '', env) || getEnv('LWA_APP_ID', '', env);
  const clientSecret = getEnv('LWA_CLIENT_SECRET', '', env);
  const awsAccessKey = getEnv('AWS_ACCESS_KEY_ID', '', env);
  const awsSecretKey = getEnv('AWS_SECRET_ACCESS_KEY', '', env);
  const roleArn = getEnv('AWS_SELLER_PARTNER_ROLE_ARN', '', env);

  const fields: Array<[string, string]> = [
    ['REFRESH_TOKEN', refreshToken],
    ['LWA_CLIENT_ID', appId],
    ['LWA_CLIENT_SECRET', clientSecret],
  ];
  const missing = fields.filter(([, value]) => !value).map(([name]) => name);

  const credentials: SpApiCredentials | null = missing.length > 0
    ? null
    : {
        refreshToken,
        appId,
        clientSecret,
        ...(awsAccessKey ? { awsAccessKey } : {}),
        ...(awsSecretKey ? { awsSecretKey } : {}),
        ...(roleArn ? { roleArn } : {}),
      };

  return {
    credentials,
    missing,
    region: parseRegion(getEnv('SPAPI_REGION', 'NA', env)),
    sandbox: getEnvFlag('SPAPI_SANDBOX', true, env),
  };
}

/**
 * Build the application configuration
 *
 * @param env - raw environment, normally process.env after loadEnv()
 * @param cwd - directory the rules file and database path are resolved against
 */
export function loadAppConfig(env: EnvSource = process.env, cwd: string = process.cwd()): AppConfig {
  const rulesPath = path.resolve(cwd, getEnv('CANCELBOT_RULES', 'rules.yaml', env));
  const { rules, found } = loadRules(rulesPath);
  const reamaze = loadReamazeConfig(env);
  const modelOverride = getEnv('ANTHROPIC_MODEL', '', env);

  return {
    rules,
    rulesPath,
    rulesFound: found,
    anthropic: {
      apiKey: getEnv('ANTHROPIC_API_KEY', '', env) || undefined,
      modelOverride: modelOverride || undefined,
    },
    reamaze: reamaze.config,
    reamazeMissing: reamaze.missing,
    spApi: loadSpApiConfig(env),
    dbPath: path.resolve(cwd, getEnv('CANCELBOT_DB', 'cancelbot.db', env)),
    reamazeWrite: getEnvFlag('REAMAZE_WRITE', false, env),
  };
}

/**
 * One-line summary for startup logs. Never includes secrets.
 */
export function describeConfig(config: AppConfig): string {
  return JSON.stringify({
    dryRun: config.rules.dryRun,
    assignee: config.rules.assignee,
    rules: config.rulesFound ? config.rulesPath : `${config.rulesPath} (missing, using defaults)`,
    reamazeBrand: config.reamaze?.brand ?? null,
    limitToConvo: config.reamaze?.limitToSlug ?? null,
    hasAnthropicKey: Boolean(config.anthropic.apiKey),
    modelOverride: config.anthropic.modelOverride ?? null,
    hasSpApiCredentials: config.spApi.credentials !== null,
    ignoredAwsSettings: config.spApi.credentials ? ignoredAwsSettings(config.spApi.credentials) : [],
    spApiRegion: config.spApi.region,
    spApiSandbox: config.spApi.sandbox,
    db: config.dbPath,
  });
}
