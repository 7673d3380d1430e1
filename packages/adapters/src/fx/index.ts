export type { FetchFn, FxRate, FxRateProvider, QueryOptions, ServiceUrlParams } from './types.js';
export { buildServiceUrl, queryExchangeRates } from './currencylayer.js';
export { readSavedQuery, savedQueryFilename, saveQueryResult } from './saved-query.js';
export {
    ExchangeRateService,
    LIVE_SOURCE,
    SAVED_SOURCE,
    type ExchangeRateServiceOptions
} from './exchange-rate-service.js';
