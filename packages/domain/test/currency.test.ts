import { describe, expect, it } from 'vitest';
import {
    createRateTable,
    crossRate,
    formatRateLine,
    isCurrencyCode,
    normalizeCurrencyCode,
    rateTableToRecord
} from '../src/currency.js';

describe('currency codes', () => {
    it('accepts exactly three uppercase letters', () => {
        expect(isCurrencyCode('THB')).toBe(true);
        expect(isCurrencyCode('thb')).toBe(false);
        expect(isCurrencyCode('TH')).toBe(false);
        expect(isCurrencyCode('THBX')).toBe(false);
    });

    it('normalizes case and surrounding whitespace', () => {
        expect(normalizeCurrencyCode(' jpy ')).toBe('JPY');
        expect(normalizeCurrencyCode('J1Y')).toBeUndefined();
    });
});

describe('createRateTable', () => {
    it('iterates in alphabetical order', () => {
        const table = createRateTable([
            ['THB', 31.2],
            ['EUR', 0.81],
            ['JPY', 105.46]
        ]);

        expect([...table.keys()]).toEqual(['EUR', 'JPY', 'THB']);
        expect(rateTableToRecord(table)).toEqual({ EUR: 0.81, JPY: 105.46, THB: 31.2 });
    });
});

describe('crossRate', () => {
    const table = createRateTable([
        ['EUR', 0.8],
        ['THB', 32],
        ['ZZZ', 0]
    ]);

    it('returns the direct rate from the base currency', () => {
        expect(crossRate(table, 'USD', 'USD', 'THB')).toBe(32);
    });

    it('inverts the rate towards the base currency', () => {
        expect(crossRate(table, 'USD', 'EUR', 'USD')).toBe(1.25);
    });

    it('divides two base-relative rates', () => {
        expect(crossRate(table, 'USD', 'EUR', 'THB')).toBe(40);
    });

    it('is undefined for unknown or zero-rated currencies', () => {
        expect(crossRate(table, 'USD', 'GBP', 'THB')).toBeUndefined();
        expect(crossRate(table, 'USD', 'ZZZ', 'THB')).toBeUndefined();
    });
});

describe('formatRateLine', () => {
    it('prints six decimals', () => {
        expect(formatRateLine('USD', 'THB', 31.17037)).toBe('USD-THB = 31.170370');
    });
});
