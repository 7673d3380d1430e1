import { InvalidRequestError, RateNotFoundError, RemoteError } from '@fxrates/domain';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { ExchangeRateService } from '../src/fx/exchange-rate-service.js';

const BODY =
    '{"success":true,"timestamp":1522051445,"source":"USD","quotes":{"USDEUR":0.8,"USDJPY":105.459999,"USDTHB":32.0}}';

function silentLogger() {
    return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function mockFetch(...responses: Array<{ status: number; body?: string }>) {
    const fetch = vi.fn();
    for (const response of responses) {
        fetch.mockResolvedValueOnce({
            status: response.status,
            ok: response.status === 200,
            text: async () => response.body ?? ''
        });
    }
    return fetch;
}

describe('ExchangeRateService', () => {
    let logger: ReturnType<typeof silentLogger>;

    beforeEach(() => {
        logger = silentLogger();
    });

    it('starts with an empty table', () => {
        const service = new ExchangeRateService({ accessKey: 'test-secret', logger });

        expect(service.getRates().size).toBe(0);
        expect(service.fetchedAt).toBeUndefined();
        expect(service.lastResponse).toBeUndefined();
        expect(service.lookup('THB')).toBe(0);
    });

    it('fills the table on refresh', async () => {
        const fetch = mockFetch({ status: 200, body: BODY });
        const service = new ExchangeRateService({ accessKey: 'test-secret', fetch, logger });

        const rates = await service.refresh();

        expect([...rates.entries()]).toEqual([
            ['EUR', 0.8],
            ['JPY', 105.459999],
            ['THB', 32]
        ]);
        expect(service.getRates()).toBe(rates);
        expect(service.lookup('thb')).toBe(32);
        expect(service.lookup('GBP')).toBe(0);
        expect(service.fetchedAt).toBeInstanceOf(Date);
        expect(service.lastResponse).toBe(BODY);
    });

    it('sends the currency filter', async () => {
        const fetch = mockFetch({ status: 200, body: '"USDTHB":32.0' });
        const service = new ExchangeRateService({ accessKey: 'test-secret', fetch, logger });

        await service.refresh(['THB', 'JPY']);

        const url = new URL(String(fetch.mock.calls[0]?.[0]));
        expect(url.searchParams.get('currencies')).toBe('THB,JPY');
        expect(url.searchParams.has('source')).toBe(false);
    });

    it('sends a non-default base currency as the source', async () => {
        const fetch = mockFetch({ status: 200, body: '"EURUSD":1.25' });
        const service = new ExchangeRateService({ accessKey: 'test-secret', baseCurrency: 'eur', fetch, logger });

        const rates = await service.refresh();

        const url = new URL(String(fetch.mock.calls[0]?.[0]));
        expect(url.searchParams.get('source')).toBe('EUR');
        expect(service.baseCurrency).toBe('EUR');
        expect(rates.get('USD')).toBe(1.25);
    });

    it('replaces the table wholesale on the next refresh', async () => {
        const fetch = mockFetch(
            { status: 200, body: '"USDTHB":31.5,"USDJPY":104.5' },
            { status: 200, body: '"USDEUR":0.81' }
        );
        const service = new ExchangeRateService({ accessKey: 'test-secret', fetch, logger });

        await service.refresh();
        await service.refresh();

        expect([...service.getRates().keys()]).toEqual(['EUR']);
    });

    it('keeps the previous table when a refresh fails', async () => {
        const fetch = mockFetch({ status: 200, body: BODY }, { status: 500 });
        const service = new ExchangeRateService({ accessKey: 'test-secret', fetch, logger });

        const first = await service.refresh();
        await expect(service.refresh()).rejects.toBeInstanceOf(RemoteError);

        expect(service.getRates()).toBe(first);
        expect(service.lookup('THB')).toBe(32);
    });

    it('loads a saved response without calling the service', () => {
        const fetch = vi.fn();
        const service = new ExchangeRateService({ accessKey: 'test-secret', fetch, logger });

        const rates = service.load('"USDTHB":31.17037,"USDJPY":104.728996');

        expect(rates.size).toBe(2);
        expect(service.lookup('JPY')).toBe(104.728996);
        expect(fetch).not.toHaveBeenCalled();
    });

    it('rejects an invalid base currency', () => {
        expect(() => new ExchangeRateService({ accessKey: 'test-secret', baseCurrency: 'dollars', logger })).toThrow(
            InvalidRequestError
        );
    });

    describe('getRate', () => {
        it('fetches once when nothing is loaded and computes cross rates', async () => {
            const fetch = mockFetch({ status: 200, body: BODY });
            const service = new ExchangeRateService({ accessKey: 'test-secret', fetch, logger });

            const direct = await service.getRate('USD', 'THB');
            const cross = await service.getRate('eur', 'thb');

            expect(fetch).toHaveBeenCalledTimes(1);
            expect(direct).toMatchObject({ from: 'USD', to: 'THB', rate: 32, source: 'currencylayer' });
            expect(cross).toMatchObject({ from: 'EUR', to: 'THB', rate: 40 });
            expect(cross.fetchedAt).toBeInstanceOf(Date);
        });

        it('reports the origin of a saved table', async () => {
            const service = new ExchangeRateService({ accessKey: 'test-secret', fetch: vi.fn(), logger });
            service.load(BODY);

            const rate = await service.getRate('THB', 'USD');

            expect(rate.source).toBe('saved-query');
            expect(rate.rate).toBe(1 / 32);
        });

        it('names the missing currency', async () => {
            const service = new ExchangeRateService({ accessKey: 'test-secret', fetch: vi.fn(), logger });
            service.load(BODY);

            await expect(service.getRate('USD', 'GBP')).rejects.toThrow(new RateNotFoundError('GBP'));
            await expect(service.getRate('GBP', 'THB')).rejects.toMatchObject({ currency: 'GBP' });
            await expect(service.getRate('US', 'THB')).rejects.toMatchObject({ currency: 'US' });
        });
    });
});
