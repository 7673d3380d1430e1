/** CurrencyLayer "live" endpoint; rates are quoted from the source currency (USD unless set). */
export const DEFAULT_SERVICE_URL = 'http://apilayer.net/api/live';
