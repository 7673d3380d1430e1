export {
    createRateTable,
    crossRate,
    formatRateLine,
    isCurrencyCode,
    normalizeCurrencyCode,
    rateTableToRecord,
    DEFAULT_BASE_CURRENCY,
    RATE_NOT_FOUND,
    type RateTable
} from './currency.js';
export {
    ConfigurationError,
    FxError,
    FX_ERROR_CODES,
    InvalidRequestError,
    isFxError,
    RateNotFoundError,
    RemoteError,
    TransportError,
    type FxErrorCode,
    type FxErrorOptions
} from './errors.js';
export { DEFAULT_SERVICE_URL } from './constants.js';
export { parseRate, parseRates, type ParseSkip, type RateParserLogger, type RateParserOptions } from './rate-parser.js';
