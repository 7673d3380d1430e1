import {
    createRateTable,
    crossRate,
    DEFAULT_BASE_CURRENCY,
    DEFAULT_SERVICE_URL,
    InvalidRequestError,
    normalizeCurrencyCode,
    parseRates,
    RATE_NOT_FOUND,
    RateNotFoundError,
    type RateTable
} from '@fxrates/domain';
import { createServiceLogger, type Logger } from '@fxrates/observability';
import { queryExchangeRates } from './currencylayer.js';
import type { FetchFn, FxRate, FxRateProvider } from './types.js';

export interface ExchangeRateServiceOptions {
    accessKey: string;
    serviceUrl?: string;
    /** Currency every rate is quoted from (default: USD). */
    baseCurrency?: string;
    fetch?: FetchFn;
    logger?: Logger;
}

export const LIVE_SOURCE = 'currencylayer';
export const SAVED_SOURCE = 'saved-query';

/**
 * Holds one rate table for the lifetime of the instance.
 *
 * The table is only ever replaced as a whole: by `refresh()` from the live
 * service, or by `load()` from a raw response obtained elsewhere. A failed
 * refresh leaves the previous table in place.
 */
export class ExchangeRateService implements FxRateProvider {
    readonly baseCurrency: string;
    private readonly accessKey: string;
    private readonly serviceUrl: string;
    private readonly fetchFn: FetchFn | undefined;
    private readonly logger: Logger;

    private table: RateTable = createRateTable([]);
    private loadedAt: Date | undefined;
    private origin = LIVE_SOURCE;
    private raw: string | undefined;

    constructor(options: ExchangeRateServiceOptions) {
        const base = normalizeCurrencyCode(options.baseCurrency ?? DEFAULT_BASE_CURRENCY);
        if (!base) {
            throw new InvalidRequestError(`Invalid base currency "${options.baseCurrency ?? ''}".`);
        }

        this.baseCurrency = base;
        this.accessKey = options.accessKey;
        this.serviceUrl = options.serviceUrl ?? DEFAULT_SERVICE_URL;
        this.fetchFn = options.fetch;
        this.logger = options.logger ?? createServiceLogger({ service: 'exchange-rate-service' });
    }

    /** Fetch rates (all currencies when `currencies` is empty) and replace the table. */
    async refresh(currencies: readonly string[] = []): Promise<RateTable> {
        const raw = await queryExchangeRates({
            serviceUrl: this.serviceUrl,
            accessKey: this.accessKey,
            currencies,
            // The service defaults to USD; only non-default sources are sent.
            ...(this.baseCurrency !== DEFAULT_BASE_CURRENCY ? { source: this.baseCurrency } : {}),
            ...(this.fetchFn ? { fetch: this.fetchFn } : {}),
            logger: this.logger
        });

        return this.load(raw, LIVE_SOURCE);
    }

    /** Parse a raw response and replace the table with the result. */
    load(raw: string, origin: string = SAVED_SOURCE): RateTable {
        const table = parseRates(raw, { base: this.baseCurrency, logger: this.logger });

        this.table = table;
        this.raw = raw;
        this.origin = origin;
        this.loadedAt = new Date();

        this.logger.info('Exchange rate table loaded', {
            base: this.baseCurrency,
            origin,
            currencyCount: table.size
        });

        return table;
    }

    getRates(): RateTable {
        return this.table;
    }

    /** Rate from the base currency to `code`, or RATE_NOT_FOUND (0). */
    lookup(code: string): number {
        const normalized = normalizeCurrencyCode(code);
        if (!normalized) return RATE_NOT_FOUND;
        return this.table.get(normalized) ?? RATE_NOT_FOUND;
    }

    get fetchedAt(): Date | undefined {
        return this.loadedAt;
    }

    /** The raw response the current table was parsed from. */
    get lastResponse(): string | undefined {
        return this.raw;
    }

    /**
     * Rate between any two currencies in the table, imputed through the base
     * currency. Fetches all rates first when nothing has been loaded yet.
     */
    async getRate(from: string, to: string): Promise<FxRate> {
        const source = normalizeCurrencyCode(from);
        if (!source) throw new RateNotFoundError(from);
        const target = normalizeCurrencyCode(to);
        if (!target) throw new RateNotFoundError(to);

        if (!this.loadedAt) {
            await this.refresh();
        }

        const rate = crossRate(this.table, this.baseCurrency, source, target);
        if (rate === undefined) {
            const missing = source === this.baseCurrency || this.table.has(source) ? target : source;
            throw new RateNotFoundError(missing);
        }

        return {
            from: source,
            to: target,
            rate,
            fetchedAt: this.loadedAt ?? new Date(),
            source: this.origin
        };
    }
}
