import type { FetchFn } from '@fxrates/adapters';
import type { Logger } from '@fxrates/observability';

export type RateSourceFlags = {
  /** Read this saved response instead of calling the service. */
  savedFile?: string;
  json: boolean;
};

export type ParsedCommand =
  | ({ kind: 'rates'; currencies: string[]; save: boolean; outputPath?: string } & RateSourceFlags)
  | ({ kind: 'rate'; currency: string } & RateSourceFlags)
  | ({ kind: 'convert'; amount: number; from: string; to: string } & RateSourceFlags)
  | { kind: 'query'; currencies: string[]; outputPath?: string };

export type CliOptions = {
  env: NodeJS.ProcessEnv;
  logger: Logger;
  fetch?: FetchFn;
  now?: () => Date;
};
