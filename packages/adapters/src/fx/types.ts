import type { Logger } from '@fxrates/observability';

export interface FxRate {
    from: string;
    to: string;
    rate: number;
    fetchedAt: Date;
    /** Where the table came from: the live service or a saved response. */
    source: string;
}

export interface FxRateProvider {
    /** Get the exchange rate between two currencies. */
    getRate(from: string, to: string): Promise<FxRate>;
}

export type FetchFn = typeof fetch;

export interface ServiceUrlParams {
    serviceUrl?: string;
    accessKey: string;
    /** Restrict the response to these codes; all currencies when empty. */
    currencies?: readonly string[];
    /** Source currency sent as the `source` query parameter. */
    source?: string;
}

export interface QueryOptions extends ServiceUrlParams {
    fetch?: FetchFn;
    logger?: Logger;
}
