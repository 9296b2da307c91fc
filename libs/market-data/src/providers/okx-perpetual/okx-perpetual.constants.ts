export const EXCHANGE_NAME = 'okx_perpetual';

export type OkxPerpetualDomain = 'okx_perpetual' | 'okx_perpetual_aws';

export const DEFAULT_DOMAIN: OkxPerpetualDomain = 'okx_perpetual';

export const REST_URLS: Record<OkxPerpetualDomain, string> = {
  okx_perpetual: 'https://www.okx.com',
  okx_perpetual_aws: 'https://aws.okx.com',
};

export const WSS_PUBLIC_URLS: Record<OkxPerpetualDomain, string> = {
  okx_perpetual: 'wss://ws.okx.com:8443/ws/v5/public',
  okx_perpetual_aws: 'wss://wsaws.okx.com:8443/ws/v5/public',
};

// REST
export const ORDER_BOOK_PATH_URL = '/api/v5/market/books';
export const TICKER_PATH_URL = '/api/v5/market/ticker';
export const INDEX_TICKERS_PATH_URL = '/api/v5/market/index-tickers';
export const MARK_PRICE_PATH_URL = '/api/v5/public/mark-price';
export const FUNDING_RATE_INFO_PATH_URL = '/api/v5/public/funding-rate';

export const ORDER_BOOK_SNAPSHOT_DEPTH = '100';
export const INSTRUMENT_TYPE_SWAP = 'SWAP';

// WS channels
export const WS_TRADES_CHANNEL = 'trades';
export const WS_ORDER_BOOK_400_DEPTH_100_MS_EVENTS_CHANNEL = 'books';
export const WS_INSTRUMENTS_INFO_CHANNEL = 'instruments';

export const WS_PING_REQUEST = 'ping';
export const WS_PONG_RESPONSE = 'pong';

export const DIFF_EVENT_TYPE = 'update';
export const FUNDING_EVENT_TYPE = 'delta';

export const SECONDS_TO_WAIT_TO_RECEIVE_MESSAGE = 25;
export const RECONNECT_DELAY_SECONDS = 5;
// Public WS allows 3 subscribe requests per second per connection.
export const SUBSCRIBE_PACING_MS = 400;
