#!/usr/bin/env node
import { loadFxEnv } from '@fxrates/config';
import { ConfigurationError } from '@fxrates/domain';
import { createCliLogger, executeCommand } from './commands.js';
import { parseCommand } from './parser.js';

function usage(): string {
  return [
    'Usage:',
    '  fx-rates rates [CODE...] [--saved <file>] [--save] [--output <file>] [--json]',
    '  fx-rates rate <CODE> [--saved <file>] [--json]',
    '  fx-rates convert <AMOUNT> <FROM> <TO> [--saved <file>] [--json]',
    '  fx-rates query [CODE...] [--output <file>]',
    '',
    'Environment:',
    '  FX_ACCESS_KEY        access key for the exchange rate service (required for live calls)',
    '  FX_SERVICE_URL       service endpoint (default http://apilayer.net/api/live)',
    '  FX_SOURCE_CURRENCY   base currency (default USD)',
    '  FX_SAVE_QUERIES      save every live response to exchange-rate-YYYY-MM-DD.txt',
    '  FX_SAVED_QUERY_FILE  read this saved response instead of calling the service',
    '  LOG_LEVEL            debug | info | warn | error (default warn)'
  ].join('\n');
}

async function main(): Promise<void> {
  const rawArgs = process.argv.slice(2);

  if (rawArgs.length === 0 || rawArgs.includes('--help') || rawArgs.includes('-h')) {
    console.log(usage());
    process.exit(0);
  }

  const env = loadFxEnv(process.env);
  const logger = createCliLogger(env);

  const command = parseCommand(rawArgs);
  const output = await executeCommand(command, { env: process.env, logger });

  console.log(output);
}

main().catch((error: unknown) => {
  if (error instanceof ConfigurationError && typeof error.details === 'string') {
    console.error(error.details);
  }
  console.error(`fx-rates error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
