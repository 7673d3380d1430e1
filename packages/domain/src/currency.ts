/**
 * Currency codes and the rate table.
 *
 * A RateTable maps a target currency code to the number of target units one
 * unit of the base currency buys. Tables are read-only once built; a refresh
 * replaces the whole table.
 */

export type RateTable = ReadonlyMap<string, number>;

/** Returned by single-currency lookups when the code is absent. */
export const RATE_NOT_FOUND = 0;

export const DEFAULT_BASE_CURRENCY = 'USD';

const CURRENCY_CODE = /^[A-Z]{3}$/;

export function isCurrencyCode(value: string): boolean {
    return CURRENCY_CODE.test(value);
}

/** Trim and upper-case `value`; `undefined` when it is not a 3-letter code. */
export function normalizeCurrencyCode(value: string): string | undefined {
    const code = value.trim().toUpperCase();
    return isCurrencyCode(code) ? code : undefined;
}

/** Build a table whose iteration order is alphabetical by code. */
export function createRateTable(entries: Iterable<readonly [string, number]>): RateTable {
    const sorted = [...entries].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return new Map(sorted);
}

function rateAgainstBase(table: RateTable, base: string, code: string): number | undefined {
    if (code === base) return 1;
    return table.get(code);
}

/**
 * Impute the `from → to` rate from two base-relative rates.
 * The base currency itself counts as 1.
 */
export function crossRate(table: RateTable, base: string, from: string, to: string): number | undefined {
    const fromRate = rateAgainstBase(table, base, from);
    const toRate = rateAgainstBase(table, base, to);

    if (fromRate === undefined || toRate === undefined || fromRate === 0) {
        return undefined;
    }

    return toRate / fromRate;
}

export function formatRateLine(base: string, code: string, rate: number): string {
    return `${base}-${code} = ${rate.toFixed(6)}`;
}

export function rateTableToRecord(table: RateTable): Record<string, number> {
    return Object.fromEntries(table);
}
