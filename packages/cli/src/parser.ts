import { normalizeCurrencyCode } from '@fxrates/domain';
import type { ParsedCommand } from './types.js';

const VALUE_FLAGS = new Set(['--saved', '--output']);
const BOOLEAN_FLAGS = new Set(['--save', '--json']);

function readFlag(args: string[], name: string): string | undefined {
  const index = args.indexOf(`--${name}`);
  if (index < 0) {
    return undefined;
  }

  const value = args[index + 1];
  if (!value || value.startsWith('--')) {
    throw new Error(`Missing value for --${name}.`);
  }

  return value;
}

function positionals(args: string[]): string[] {
  const out: string[] = [];

  for (let i = 0; i < args.length; i += 1) {
    const current = args[i];
    if (current === undefined) {
      continue;
    }

    if (VALUE_FLAGS.has(current)) {
      i += 1;
      continue;
    }

    if (BOOLEAN_FLAGS.has(current)) {
      continue;
    }

    if (current.startsWith('--')) {
      throw new Error(`Unknown option ${current}.`);
    }

    out.push(current);
  }

  return out;
}

function parseCode(value: string): string {
  const code = normalizeCurrencyCode(value);
  if (!code) {
    throw new Error(`Invalid currency code "${value}". Expected 3 letters, e.g. THB.`);
  }

  return code;
}

function rejectFlags(argv: string[], flags: string[]): void {
  const flag = flags.find((name) => argv.includes(name));
  if (flag) {
    throw new Error(`Unknown option ${flag}.`);
  }
}

function sourceFlags(argv: string[]): { savedFile?: string; json: boolean } {
  const savedFile = readFlag(argv, 'saved');
  return {
    ...(savedFile ? { savedFile } : {}),
    json: argv.includes('--json')
  };
}

export function parseCommand(argv: string[]): ParsedCommand {
  const [scope, ...rest] = positionals(argv);

  if (scope === 'rates') {
    const outputPath = readFlag(argv, 'output');
    return {
      kind: 'rates',
      currencies: rest.map(parseCode),
      save: argv.includes('--save') || outputPath !== undefined,
      ...(outputPath ? { outputPath } : {}),
      ...sourceFlags(argv)
    };
  }

  if (scope === 'rate') {
    rejectFlags(argv, ['--output', '--save']);
    const [code] = rest;
    if (!code || rest.length > 1) {
      throw new Error('Usage: fx-rates rate <CODE>');
    }

    return {
      kind: 'rate',
      currency: parseCode(code),
      ...sourceFlags(argv)
    };
  }

  if (scope === 'convert') {
    rejectFlags(argv, ['--output', '--save']);
    const [amountRaw, from, to] = rest;
    if (!amountRaw || !from || !to || rest.length > 3) {
      throw new Error('Usage: fx-rates convert <AMOUNT> <FROM> <TO>');
    }

    const amount = Number(amountRaw);
    if (!Number.isFinite(amount) || amount < 0) {
      throw new Error('Invalid amount. It must be a non-negative number.');
    }

    return {
      kind: 'convert',
      amount,
      from: parseCode(from),
      to: parseCode(to),
      ...sourceFlags(argv)
    };
  }

  if (scope === 'query') {
    rejectFlags(argv, ['--saved', '--json']);
    const outputPath = readFlag(argv, 'output');
    return {
      kind: 'query',
      currencies: rest.map(parseCode),
      ...(outputPath ? { outputPath } : {})
    };
  }

  throw new Error('Unknown command. Supported: rates, rate, convert, query.');
}
