#!/usr/bin/env node

/**
 * Cancelbot CLI
 *   cancelbot [run]   triage one unresolved ticket
 *   cancelbot check   connectivity check (read-only unless REAMAZE_WRITE=1)
 */

import { ConfigurationError, createLogger, getErrorMessage, loadEnv } from '@cancel-triage/shared';
import { createTriageApp } from './app.js';
import { ReamazeClient } from './clients/reamaze-client.js';
import { SpApiClient } from './clients/sp-api-client.js';
import { describeConfig, loadAppConfig, type AppConfig } from './config.js';
import { formatConnectionReport, runConnectionCheck } from './services/connection-check.js';
import { EXIT_CODES, exitCodeFor, formatRunReport } from './utils/run-report.js';

export type Command = 'run' | 'check';

const USAGE = 'Usage: cancelbot [run|check]';

const logger = createLogger('Cancelbot');

export function parseCommand(args: string[]): Command | null {
  const [command = 'run', ...rest] = args;
  if (rest.length > 0) {
    return null;
  }
  return command === 'run' || command === 'check' ? command : null;
}

async function runTriage(config: AppConfig): Promise<number> {
  const app = await createTriageApp(config, { trace: (line) => console.log(line) });
  console.log(`Mode: ${config.rules.dryRun ? 'DRY RUN' : 'LIVE'}`);

  try {
    const report = await app.pipeline.runOnce();
    console.log('');
    console.log(formatRunReport(report));
    return exitCodeFor(report);
  } finally {
    await app.close();
  }
}

async function runCheck(config: AppConfig): Promise<number> {
  if (!config.reamaze) {
    throw new ConfigurationError(`Missing Re:amaze configuration: ${config.reamazeMissing.join(', ')}`);
  }

  const spApi = config.spApi;
  const report = await runConnectionCheck({
    ticketing: new ReamazeClient(config.reamaze),
    createFulfillmentClient: spApi.credentials ? () => new SpApiClient(spApi) : null,
    spApiMissing: spApi.missing,
    writeNote: config.reamazeWrite,
  });

  console.log(formatConnectionReport(report));
  return report.ok ? EXIT_CODES.handled : EXIT_CODES.failure;
}

export async function main(args: string[] = process.argv.slice(2)): Promise<number> {
  const command = parseCommand(args);
  if (!command) {
    console.error(USAGE);
    return EXIT_CODES.failure;
  }

  try {
    loadEnv();
    const config = loadAppConfig();
    logger.info(`config ${describeConfig(config)}`);

    return command === 'check' ? await runCheck(config) : await runTriage(config);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`Configuration error: ${error.message}`);
    } else {
      logger.error(`unhandled failure: ${getErrorMessage(error)}`, error);
    }
    return EXIT_CODES.failure;
  }
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      logger.error('fatal', error);
      process.exitCode = EXIT_CODES.failure;
    }
  );
}
