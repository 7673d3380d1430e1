import { createServiceLogger, type Logger } from '@fxrates/observability';
import {
    createRateTable,
    DEFAULT_BASE_CURRENCY,
    isCurrencyCode,
    RATE_NOT_FOUND,
    type RateTable
} from './currency.js';
import { InvalidRequestError } from './errors.js';

/**
 * Rate Parser.
 *
 * Extracts `"<BASE><CODE>":<number>` pairs from a raw service response without
 * parsing the surrounding JSON. Whole numbers (such as the `"USDUSD":1`
 * self-quote) are not rates and are passed over silently. Any other value
 * that is not a decimal literal (digits, a point, digits) is skipped with a
 * diagnostic; one bad entry never fails the whole parse.
 */

/** A matched entry whose value could not be converted. */
export interface ParseSkip {
    code: string;
    value: string;
    /** Index of the match in the input text. */
    offset: number;
}

export type RateParserLogger = Pick<Logger, 'debug' | 'warn'>;

export interface RateParserOptions {
    /** Base currency prefix of every key (default: USD). */
    base?: string;
    logger?: RateParserLogger;
    onSkip?: (skip: ParseSkip) => void;
}

const defaultLogger = createServiceLogger({ service: 'rate-parser' });

const DECIMAL_LITERAL = /^\d+\.\d+$/;
const INTEGER_LITERAL = /^\d+$/;

// Value token: everything up to the next separator or quote.
const VALUE_TOKEN = '([^,}\\]\\s"]*)';

function entryPattern(base: string, code: string, flags?: string): RegExp {
    return new RegExp(`"${base}${code}":\\s*${VALUE_TOKEN}`, flags);
}

function resolveBase(base: string | undefined): string {
    const resolved = base ?? DEFAULT_BASE_CURRENCY;
    if (!isCurrencyCode(resolved)) {
        throw new InvalidRequestError(`Invalid base currency "${resolved}". Expected 3 uppercase letters.`);
    }
    return resolved;
}

function toRate(literal: string): number | undefined {
    if (!DECIMAL_LITERAL.test(literal)) return undefined;
    const rate = Number(literal);
    return Number.isFinite(rate) ? rate : undefined;
}

function reportSkip(skip: ParseSkip, base: string, options: RateParserOptions, logger: RateParserLogger): void {
    logger.warn('Invalid number in exchange rate, entry skipped', {
        pair: `${base}${skip.code}`,
        value: skip.value,
        offset: skip.offset
    });
    options.onSkip?.(skip);
}

/**
 * Find every rate in `text`.
 *
 * Each search resumes at the end of the previous match, so matches never
 * overlap and the scan always terminates. A code seen twice keeps the value
 * of its last occurrence.
 *
 * @returns rates keyed by currency code, in alphabetical order; empty when nothing matched.
 */
export function parseRates(text: string, options: RateParserOptions = {}): RateTable {
    const base = resolveBase(options.base);
    const logger = options.logger ?? defaultLogger;
    const pattern = entryPattern(base, '([A-Z]{3})', 'g');
    const rates = new Map<string, number>();

    let offset = 0;
    while (offset <= text.length) {
        pattern.lastIndex = offset;
        const match = pattern.exec(text);
        if (!match) break;

        const code = match[1] ?? '';
        const value = match[2] ?? '';
        offset = match.index + match[0].length;
        if (INTEGER_LITERAL.test(value)) continue;

        const rate = toRate(value);
        if (rate === undefined) {
            reportSkip({ code, value, offset: match.index }, base, options, logger);
            continue;
        }

        logger.debug('Found exchange rate', { pair: `${base}${code}`, rate });
        rates.set(code, rate);
    }

    return createRateTable(rates);
}

/**
 * Find the rate for one currency.
 *
 * Only the first occurrence of the code whose value is not a whole number is
 * considered.
 *
 * @returns the rate, or RATE_NOT_FOUND (0) when the code is absent, its value is malformed, or the code is not 3 uppercase letters.
 */
export function parseRate(code: string, text: string, options: RateParserOptions = {}): number {
    const base = resolveBase(options.base);
    if (!isCurrencyCode(code)) return RATE_NOT_FOUND;

    const logger = options.logger ?? defaultLogger;
    const pattern = entryPattern(base, code, 'g');
    let match = pattern.exec(text);
    while (match && INTEGER_LITERAL.test(match[1] ?? '')) {
        match = pattern.exec(text);
    }
    if (!match) return RATE_NOT_FOUND;

    const value = match[1] ?? '';
    const rate = toRate(value);
    if (rate === undefined) {
        reportSkip({ code, value, offset: match.index }, base, options, logger);
        return RATE_NOT_FOUND;
    }

    logger.debug('Found exchange rate', { pair: `${base}${code}`, rate });
    return rate;
}
