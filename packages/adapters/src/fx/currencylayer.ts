import {
    ConfigurationError,
    DEFAULT_SERVICE_URL,
    InvalidRequestError,
    normalizeCurrencyCode,
    RemoteError,
    TransportError
} from '@fxrates/domain';
import { createServiceLogger, redactUrl } from '@fxrates/observability';
import type { QueryOptions, ServiceUrlParams } from './types.js';

const logger = createServiceLogger({ service: 'currencylayer' });

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function requireCode(value: string, label: string): string {
    const code = normalizeCurrencyCode(value);
    if (!code) {
        throw new InvalidRequestError(`Invalid ${label} "${value}". Expected a 3-letter currency code.`);
    }
    return code;
}

/**
 * Build the request URL for the CurrencyLayer "live" endpoint.
 * Nothing is sent; a malformed URL or currency code throws InvalidRequestError.
 */
export function buildServiceUrl(params: ServiceUrlParams): URL {
    if (params.accessKey.trim().length === 0) {
        throw new ConfigurationError('An access key is required to query the exchange rate service.');
    }

    const serviceUrl = params.serviceUrl ?? DEFAULT_SERVICE_URL;
    let url: URL;
    try {
        url = new URL(serviceUrl);
    } catch (error) {
        throw new InvalidRequestError(`Invalid URL: ${serviceUrl}`, { cause: error });
    }

    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
        throw new InvalidRequestError(`Unsupported URL protocol "${url.protocol}" in ${serviceUrl}`);
    }

    url.searchParams.set('access_key', params.accessKey);

    const currencies = (params.currencies ?? []).map((code) => requireCode(code, 'currency code'));
    if (currencies.length > 0) {
        url.searchParams.set('currencies', currencies.join(','));
    }

    if (params.source !== undefined) {
        url.searchParams.set('source', requireCode(params.source, 'source currency'));
    }

    return url;
}

/**
 * Query the exchange rate service once.
 *
 * There is no retry and no timeout beyond the transport's own.
 *
 * @returns the response body with newlines removed.
 * @throws InvalidRequestError when the URL cannot be built (nothing is sent).
 * @throws RemoteError when the status is not 200 (the body is not read).
 * @throws TransportError when the connection or the body read fails.
 */
export async function queryExchangeRates(options: QueryOptions): Promise<string> {
    const url = buildServiceUrl(options);
    const log = options.logger ?? logger;
    const fetchFn = options.fetch ?? globalThis.fetch;

    log.info('Calling exchange rate service', { url: redactUrl(url.toString()) });

    let response: Response;
    try {
        response = await fetchFn(url);
    } catch (error) {
        throw new TransportError(`Could not reach the exchange rate service: ${errorMessage(error)}`, { cause: error });
    }

    if (response.status !== 200) {
        log.warn('Exchange rate service returned an error status', { status: response.status });
        await response.body?.cancel().catch((error: unknown) => {
            log.debug('Could not discard the error response body', { error: errorMessage(error) });
        });
        throw new RemoteError(response.status);
    }

    let body: string;
    try {
        body = await response.text();
    } catch (error) {
        throw new TransportError(`Could not read the exchange rate response: ${errorMessage(error)}`, { cause: error });
    }

    const data = body.replace(/[\r\n]/g, '');
    log.info('Exchange rate response received', { bytes: data.length });
    return data;
}
