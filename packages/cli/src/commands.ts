import {
  ExchangeRateService,
  LIVE_SOURCE,
  readSavedQuery,
  savedQueryFilename,
  saveQueryResult
} from '@fxrates/adapters';
import { loadFxClientEnv, loadFxEnv, type FxEnv } from '@fxrates/config';
import { formatRateLine, rateTableToRecord } from '@fxrates/domain';
import { createServiceLogger, type Logger } from '@fxrates/observability';
import type { CliOptions, ParsedCommand } from './types.js';

type RateCommand = Exclude<ParsedCommand, { kind: 'query' }>;

function json(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

/** Log lines go to stderr so that stdout carries only command output. */
export function createCliLogger(env: FxEnv): Logger {
  return createServiceLogger({ service: 'fx-rates', minLevel: env.LOG_LEVEL ?? 'warn', stderr: true });
}

function createService(env: FxEnv, options: CliOptions, accessKey: string): ExchangeRateService {
  return new ExchangeRateService({
    accessKey,
    serviceUrl: env.FX_SERVICE_URL,
    baseCurrency: env.FX_SOURCE_CURRENCY,
    logger: options.logger,
    ...(options.fetch ? { fetch: options.fetch } : {})
  });
}

/**
 * Fill a service from the saved response when one is configured, otherwise
 * from the live service (saving the response when asked to).
 */
async function loadRates(command: RateCommand, options: CliOptions): Promise<ExchangeRateService> {
  const env = loadFxEnv(options.env);
  const savedFile = command.savedFile ?? env.FX_SAVED_QUERY_FILE;

  if (savedFile) {
    const service = createService(env, options, env.FX_ACCESS_KEY ?? '');
    service.load(await readSavedQuery(savedFile, options.logger));
    return service;
  }

  const clientEnv = loadFxClientEnv(options.env);
  const service = createService(clientEnv, options, clientEnv.FX_ACCESS_KEY);
  await service.refresh(command.kind === 'rates' ? command.currencies : []);

  const save = command.kind === 'rates' ? command.save : false;
  if (save || clientEnv.FX_SAVE_QUERIES) {
    const outputPath =
      (command.kind === 'rates' ? command.outputPath : undefined) ?? savedQueryFilename(options.now?.() ?? new Date());
    await saveQueryResult(service.lastResponse ?? '', outputPath, options.logger);
  }

  return service;
}

export async function executeCommand(command: ParsedCommand, options: CliOptions): Promise<string> {
  if (command.kind === 'query') {
    const clientEnv = loadFxClientEnv(options.env);
    const service = createService(clientEnv, options, clientEnv.FX_ACCESS_KEY);
    await service.refresh(command.currencies);

    const outputPath = command.outputPath ?? savedQueryFilename(options.now?.() ?? new Date());
    const saved = await saveQueryResult(service.lastResponse ?? '', outputPath, options.logger);
    if (!saved) {
      throw new Error(`Could not write the response to ${outputPath}.`);
    }

    return `Saved ${service.getRates().size} exchange rates to ${outputPath}`;
  }

  const service = await loadRates(command, options);
  const base = service.baseCurrency;

  if (command.kind === 'rates') {
    const rates = service.getRates();
    if (command.json) {
      return json({ base, rates: rateTableToRecord(rates) });
    }

    if (rates.size === 0) {
      return 'No exchange rates found.';
    }

    return [...rates].map(([code, rate]) => formatRateLine(base, code, rate)).join('\n');
  }

  if (command.kind === 'rate') {
    const rate = service.lookup(command.currency);
    if (command.json) {
      return json({ base, currency: command.currency, rate });
    }

    return formatRateLine(base, command.currency, rate);
  }

  const fx = await service.getRate(command.from, command.to);
  const converted = command.amount * fx.rate;

  if (command.json) {
    return json({ ...fx, fetchedAt: fx.fetchedAt.toISOString(), amount: command.amount, converted });
  }

  const origin = fx.source === LIVE_SOURCE ? '' : ` (${fx.source})`;
  return `${command.amount} ${fx.from} = ${converted.toFixed(6)} ${fx.to} at ${fx.rate.toFixed(6)}${origin}`;
}
