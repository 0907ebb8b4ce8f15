/**
 * Application configuration Unit Tests
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { ConfigurationError } from '@cancel-triage/shared';
import { DEFAULT_RULES, describeConfig, loadAppConfig, loadRules, parseRules } from '../config';

const reamazeEnv = {
  REAMAZE_BRAND: 'test-brand',
  REAMAZE_EMAIL: 'agent@example.com',
  REAMAZE_API_TOKEN: 'test-token',
};

const spApiEnv = {
  REFRESH_TOKEN: 'test-refresh-token',
  LWA_APP_ID: 'test-app-id',
  LWA_CLIENT_SECRET: 'test-secret',
};

describe('parseRules', () => {
  it('should give the defaults for an empty document', () => {
    expect(parseRules('')).toEqual({
      dryRun: true,
      assignee: null,
      tags: { success: [], failure: [], not_cancellation: [] },
    });
  });

  it('should read every field', () => {
    const yaml = [
      'dry_run: false',
      'assignee: "  Support Lead "',
      'tags:',
      '  success: [auto-cancelled, " "]',
      '  failure:',
      '    - needs-human',
    ].join('\n');

    expect(parseRules(yaml)).toEqual({
      dryRun: false,
      assignee: 'Support Lead',
      tags: { success: ['auto-cancelled'], failure: ['needs-human'], not_cancellation: [] },
    });
  });

  it('should keep dry run on when the key is null', () => {
    expect(parseRules('dry_run:\nassignee:\n').dryRun).toBe(true);
  });

  it('should reject malformed YAML', () => {
    expect(() => parseRules('dry_run: [', 'rules.yaml')).toThrow(new ConfigurationError('Invalid YAML in rules.yaml'));
  });

  it('should reject values of the wrong type', () => {
    expect(() => parseRules('dry_run: "no"')).toThrow(/^Invalid rules file: dry_run: /);
  });

  it('should reject a document that is not a mapping', () => {
    expect(() => parseRules('- a\n- b')).toThrow(/^Invalid rules file: \(root\): /);
  });
});

describe('loadAppConfig', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cancelbot-config-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should fall back to safe defaults', () => {
    const config = loadAppConfig({ ...reamazeEnv }, tempDir);

    expect(config.rules).toEqual(DEFAULT_RULES);
    expect(config.rulesFound).toBe(false);
    expect(config.rulesPath).toBe(path.join(tempDir, 'rules.yaml'));
    expect(config.dbPath).toBe(path.join(tempDir, 'cancelbot.db'));
    expect(config.reamaze).toEqual({
      brand: 'test-brand',
      email: 'agent@example.com',
      apiToken: 'test-token',
      limitToSlug: undefined,
    });
    expect(config.anthropic).toEqual({ apiKey: undefined, modelOverride: undefined });
    expect(config.spApi).toEqual({
      credentials: null,
      missing: ['REFRESH_TOKEN', 'LWA_CLIENT_ID', 'LWA_CLIENT_SECRET'],
      region: 'NA',
      sandbox: true,
    });
    expect(config.reamazeWrite).toBe(false);
  });

  it('should list missing Re:amaze variables', () => {
    const config = loadAppConfig({ REAMAZE_BRAND: 'test-brand' }, tempDir);

    expect(config.reamaze).toBeNull();
    expect(config.reamazeMissing).toEqual(['REAMAZE_EMAIL', 'REAMAZE_API_TOKEN']);
  });

  it('should read the SP-API credential bundle', () => {
    const config = loadAppConfig({
      ...reamazeEnv,
      ...spApiEnv,
      AWS_ACCESS_KEY_ID: 'test-access-key',
      AWS_SECRET_ACCESS_KEY: 'test-secret-key',
      AWS_SELLER_PARTNER_ROLE_ARN: 'arn:aws:iam::000000000000:role/sp-api',
      SPAPI_SANDBOX: '0',
      SPAPI_REGION: 'eu',
    }, tempDir);

    expect(config.spApi).toEqual({
      credentials: {
        refreshToken: 'test-refresh-token',
        appId: 'test-app-id',
        clientSecret: 'test-secret',
        awsAccessKey: 'test-access-key',
        awsSecretKey: 'test-secret-key',
        roleArn: 'arn:aws:iam::000000000000:role/sp-api',
      },
      missing: [],
      region: 'EU',
      sandbox: false,
    });
  });

  it('should build the credential bundle without AWS settings', () => {
    const config = loadAppConfig({ ...reamazeEnv, ...spApiEnv }, tempDir);

    expect(config.spApi.credentials).toEqual({
      refreshToken: 'test-refresh-token',
      appId: 'test-app-id',
      clientSecret: 'test-secret',
    });
    expect(config.spApi.missing).toEqual([]);
  });

  it('should report AWS settings as ignored', () => {
    const config = loadAppConfig({ ...reamazeEnv, ...spApiEnv, AWS_ACCESS_KEY_ID: 'test-access-key' }, tempDir);

    expect(JSON.parse(describeConfig(config)).ignoredAwsSettings).toEqual(['AWS_ACCESS_KEY_ID']);
  });

  it('should reject an unknown region', () => {
    expect(() => loadAppConfig({ ...reamazeEnv, SPAPI_REGION: 'MARS' }, tempDir)).toThrow(
      new ConfigurationError('SPAPI_REGION must be one of NA, EU, FE, got "MARS"')
    );
  });

  it('should load the rules file and resolve paths against the working directory', () => {
    fs.writeFileSync(path.join(tempDir, 'custom-rules.yaml'), 'dry_run: false\nassignee: Ops\n');

    const config = loadAppConfig({
      ...reamazeEnv,
      CANCELBOT_RULES: 'custom-rules.yaml',
      CANCELBOT_DB: 'data/audit.db',
      LIMIT_TO_CONVO: 'vip-ticket',
      ANTHROPIC_API_KEY: 'test-key',
      ANTHROPIC_MODEL: 'claude-custom',
      REAMAZE_WRITE: '1',
    }, tempDir);

    expect(config.rulesFound).toBe(true);
    expect(config.rules).toEqual({
      dryRun: false,
      assignee: 'Ops',
      tags: { success: [], failure: [], not_cancellation: [] },
    });
    expect(config.dbPath).toBe(path.join(tempDir, 'data', 'audit.db'));
    expect(config.reamaze?.limitToSlug).toBe('vip-ticket');
    expect(config.anthropic).toEqual({ apiKey: 'test-key', modelOverride: 'claude-custom' });
    expect(config.reamazeWrite).toBe(true);
  });

  it('should describe the configuration without secrets', () => {
    const config = loadAppConfig({ ...reamazeEnv, ANTHROPIC_API_KEY: 'test-key' }, tempDir);

    expect(JSON.parse(describeConfig(config))).toEqual({
      dryRun: true,
      assignee: null,
      rules: `${path.join(tempDir, 'rules.yaml')} (missing, using defaults)`,
      reamazeBrand: 'test-brand',
      limitToConvo: null,
      hasAnthropicKey: true,
      modelOverride: null,
      hasSpApiCredentials: false,
      ignoredAwsSettings: [],
      spApiRegion: 'NA',
      spApiSandbox: true,
      db: path.join(tempDir, 'cancelbot.db'),
    });
  });
});

describe('loadRules', () => {
  it('should report a missing file', () => {
    expect(loadRules(path.join(os.tmpdir(), 'does-not-exist', 'rules.yaml'))).toEqual({ rules: DEFAULT_RULES, found: false });
  });
});
