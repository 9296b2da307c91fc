import { Logger } from '@nestjs/common';
import { errorMessage, isCancelledError, IdleTimeoutError, CancelledError } from '../../errors';
import {
  RestAssistant,
  Sleep,
  SymbolTranslator,
  WsAssistant,
  WsAssistantFactory,
} from '../../interfaces';
import { MessageQueue } from '../../message-queue';
import {
  ChannelEventMap,
  ChannelKind,
  FundingInfo,
  OrderBookMessage,
  ProviderSnapshot,
  StreamState,
  SubscribeRequest,
} from '../../models';
import { NonceCreator } from '../../nonce-creator';
import {
  classifyOkxMessage,
  normalizeOkxFundingDelta,
  normalizeOkxFundingInfo,
  normalizeOkxOrderBookDiff,
  normalizeOkxOrderBookSnapshot,
  normalizeOkxTrades,
  parseWith,
} from '../../normalizers';
import { raceAbort, sleep as defaultSleep, throwIfCancelled } from '../../utils/abort.util';
import { isRecord } from '../../utils/guards';
import {
  EXCHANGE_NAME,
  FUNDING_RATE_INFO_PATH_URL,
  INDEX_TICKERS_PATH_URL,
  INSTRUMENT_TYPE_SWAP,
  MARK_PRICE_PATH_URL,
  ORDER_BOOK_PATH_URL,
  ORDER_BOOK_SNAPSHOT_DEPTH,
  RECONNECT_DELAY_SECONDS,
  SECONDS_TO_WAIT_TO_RECEIVE_MESSAGE,
  SUBSCRIBE_PACING_MS,
  TICKER_PATH_URL,
  WS_INSTRUMENTS_INFO_CHANNEL,
  WS_ORDER_BOOK_400_DEPTH_100_MS_EVENTS_CHANNEL,
  WS_PING_REQUEST,
  WS_PONG_RESPONSE,
  WS_TRADES_CHANNEL,
} from './okx-perpetual.constants';
import { lastTradedPriceResponse } from './okx-perpetual.schemas';
import {
  OkxPerpetualEndpoints,
  getOkxPerpetualEndpoints,
  getRestApiLimitIdForEndpoint,
  getRestUrlForEndpoint,
} from './okx-perpetual.web-utils';

export interface SubscribeBatch {
  tradesRequest: SubscribeRequest;
  orderBookRequest: SubscribeRequest;
  instrumentsRequest: SubscribeRequest;
}

export interface OkxPerpetualDataSourceOptions {
  tradingPairs: string[];
  restAssistant: RestAssistant;
  wsAssistantFactory: WsAssistantFactory;
  translator: SymbolTranslator;
  endpoints?: OkxPerpetualEndpoints;
  nonceCreator?: NonceCreator;
  sleep?: Sleep;
  messageTimeoutSeconds?: number;
  reconnectDelaySeconds?: number;
  /** Gap between the three subscribe sends; 0 sends them back to back. */
  subscribePacingMs?: number;
  now?: () => number;
}

const subscribeRequest = (channel: string, instIds: string[]): SubscribeRequest => ({
  op: 'subscribe',
  args: instIds.map((instId) => ({ channel, instId })),
});

export const buildSubscribeBatch = (instIds: string[]): SubscribeBatch => ({
  tradesRequest: subscribeRequest(WS_TRADES_CHANNEL, instIds),
  orderBookRequest: subscribeRequest(WS_ORDER_BOOK_400_DEPTH_100_MS_EVENTS_CHANNEL, instIds),
  instrumentsRequest: subscribeRequest(WS_INSTRUMENTS_INFO_CHANNEL, instIds),
});

const assertNever = (value: never): never => {
  throw new Error(`Unhandled channel route: ${String(value)}`);
};

export class OkxPerpetualOrderBookDataSource {
  readonly provider = EXCHANGE_NAME;
  readonly queues: { [K in ChannelKind]: MessageQueue<ChannelEventMap[K]> } = {
    trade: new MessageQueue(),
    diff: new MessageQueue(),
    funding: new MessageQueue(),
  };

  private readonly logger = new Logger(OkxPerpetualOrderBookDataSource.name);
  private readonly tradingPairs: string[];
  private readonly restAssistant: RestAssistant;
  private readonly wsAssistantFactory: WsAssistantFactory;
  private readonly translator: SymbolTranslator;
  private readonly endpoints: OkxPerpetualEndpoints;
  private readonly nonceCreator: NonceCreator;
  private readonly sleep: Sleep;
  private readonly messageTimeoutMs: number;
  private readonly reconnectDelayMs: number;
  private readonly subscribePacingMs: number;
  private readonly now: () => number;

  private state: StreamState = 'disconnected';
  private lastMessageTs: number | null = null;
  private reconnects = 0;
  private failures = 0;
  private droppedMessages = 0;
  private lastError: string | null = null;

  constructor(options: OkxPerpetualDataSourceOptions) {
    this.tradingPairs = [...options.tradingPairs];
    this.restAssistant = options.restAssistant;
    this.wsAssistantFactory = options.wsAssistantFactory;
    this.translator = options.translator;
    this.endpoints = options.endpoints ?? getOkxPerpetualEndpoints();
    this.nonceCreator = options.nonceCreator ?? NonceCreator.forMicroseconds();
    this.sleep = options.sleep ?? defaultSleep;
    this.messageTimeoutMs = (options.messageTimeoutSeconds ?? SECONDS_TO_WAIT_TO_RECEIVE_MESSAGE) * 1000;
    this.reconnectDelayMs = (options.reconnectDelaySeconds ?? RECONNECT_DELAY_SECONDS) * 1000;
    this.subscribePacingMs = options.subscribePacingMs ?? SUBSCRIBE_PACING_MS;
    this.now = options.now ?? Date.now;
  }

  getSnapshot(): ProviderSnapshot {
    return {
      provider: this.provider,
      state: this.state,
      connected: this.state === 'subscribing' || this.state === 'streaming',
      lastMessageTs: this.lastMessageTs,
      reconnects: this.reconnects,
      failures: this.failures,
      droppedMessages: this.droppedMessages,
      lastError: this.lastError,
    };
  }

  // ---------------------------------------------------------------------------
  // REST snapshots
  // ---------------------------------------------------------------------------

  async fetchOrderBookSnapshot(tradingPair: string, signal?: AbortSignal): Promise<OrderBookMessage> {
    const response = await this.restAssistant.execute({
      url: getRestUrlForEndpoint(ORDER_BOOK_PATH_URL, this.endpoints),
      method: 'GET',
      params: { instId: this.translator.toNative(tradingPair), sz: ORDER_BOOK_SNAPSHOT_DEPTH },
      throttlerLimitId: getRestApiLimitIdForEndpoint(ORDER_BOOK_PATH_URL),
      signal,
    });
    return normalizeOkxOrderBookSnapshot(response, tradingPair, this.nonceCreator);
  }

  /**
   * Index, mark and funding data are requested together; the first failure
   * rejects the whole call.
   */
  async fetchFundingInfo(tradingPair: string, signal?: AbortSignal): Promise<FundingInfo> {
    const instId = this.translator.toNative(tradingPair);
    const responses = await Promise.all([
      this.restAssistant.execute({
        url: getRestUrlForEndpoint(INDEX_TICKERS_PATH_URL, this.endpoints),
        method: 'GET',
        params: { instId },
        throttlerLimitId: getRestApiLimitIdForEndpoint(INDEX_TICKERS_PATH_URL),
        signal,
      }),
      this.restAssistant.execute({
        url: getRestUrlForEndpoint(MARK_PRICE_PATH_URL, this.endpoints),
        method: 'GET',
        params: { instId, instType: INSTRUMENT_TYPE_SWAP },
        throttlerLimitId: getRestApiLimitIdForEndpoint(MARK_PRICE_PATH_URL, tradingPair),
        isAuthRequired: true,
        signal,
      }),
      this.restAssistant.execute({
        url: getRestUrlForEndpoint(FUNDING_RATE_INFO_PATH_URL, this.endpoints),
        method: 'GET',
        params: { instId },
        throttlerLimitId: getRestApiLimitIdForEndpoint(FUNDING_RATE_INFO_PATH_URL),
        signal,
      }),
    ]);
    return normalizeOkxFundingInfo(responses, tradingPair);
  }

  async fetchLastTradedPrices(tradingPairs: string[], signal?: AbortSignal): Promise<Record<string, number>> {
    const prices = await Promise.all(
      tradingPairs.map(async (tradingPair) => {
        const response = await this.restAssistant.execute({
          url: getRestUrlForEndpoint(TICKER_PATH_URL, this.endpoints),
          method: 'GET',
          params: { instId: this.translator.toNative(tradingPair) },
          throttlerLimitId: getRestApiLimitIdForEndpoint(TICKER_PATH_URL),
          signal,
        });
        const [ticker] = parseWith(lastTradedPriceResponse, response, 'ticker').data;
        return [tradingPair, ticker.last] as const;
      }),
    );
    return Object.fromEntries(prices);
  }

  // ---------------------------------------------------------------------------
  // Stream lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Connects, subscribes and pumps stream messages until `signal` aborts.
   * Every failure other than cancellation is followed by a fixed backoff and
   * a fresh connection.
   */
  async listenForSubscriptions(signal: AbortSignal): Promise<void> {
    await this.listenForSubscriptionsOnUrl(this.endpoints.ws, this.tradingPairs, signal);
  }

  async subscribeToChannels(ws: WsAssistant, tradingPairs: string[], signal?: AbortSignal): Promise<void> {
    try {
      const batch = buildSubscribeBatch(tradingPairs.map((pair) => this.translator.toNative(pair)));
      const requests = [batch.tradesRequest, batch.orderBookRequest, batch.instrumentsRequest];

      for (const [index, request] of requests.entries()) {
        if (index > 0 && this.subscribePacingMs > 0) {
          await this.sleep(this.subscribePacingMs, signal);
        }
        await raceAbort(ws.send(request), signal);
      }
      this.logger.log(
        JSON.stringify({
          event: 'stream_subscribed',
          provider: this.provider,
          channels: requests.map((request) => request.args[0]?.channel ?? null),
          pairs: tradingPairs.length,
        }),
      );
    } catch (error) {
      if (isCancelledError(error)) {
        throw error;
      }
      this.logger.error(
        JSON.stringify({ event: 'stream_subscribe_failed', provider: this.provider, message: errorMessage(error) }),
      );
      throw error;
    }
  }

  /**
   * Classifies one inbound frame, normalizes it and enqueues the result.
   * A frame that fails normalization is logged and dropped.
   */
  processMessage(payload: unknown): void {
    if (payload === WS_PONG_RESPONSE) {
      return;
    }
    if (isRecord(payload) && payload.event === 'error') {
      this.logger.warn(
        JSON.stringify({ event: 'stream_error_event', provider: this.provider, code: payload.code, msg: payload.msg }),
      );
    }

    const route = classifyOkxMessage(payload);
    try {
      switch (route) {
        case 'trade':
          for (const trade of normalizeOkxTrades(payload, this.translator)) {
            this.queues.trade.putNowait(trade);
          }
          return;
        case 'diff': {
          const diff = normalizeOkxOrderBookDiff(payload, this.translator, this.nonceCreator);
          if (diff) {
            this.queues.diff.putNowait(diff);
          }
          return;
        }
        case 'funding':
          for (const update of normalizeOkxFundingDelta(payload, this.translator)) {
            this.queues.funding.putNowait(update);
          }
          return;
        case 'unrouted':
          return;
        default:
          assertNever(route);
      }
    } catch (error) {
      this.droppedMessages += 1;
      this.logger.warn(
        JSON.stringify({
          event: 'stream_message_dropped',
          provider: this.provider,
          channel: route,
          message: errorMessage(error),
        }),
      );
    }
  }

  private async listenForSubscriptionsOnUrl(
    url: string,
    tradingPairs: string[],
    signal: AbortSignal,
  ): Promise<void> {
    for (;;) {
      throwIfCancelled(signal);
      let ws: WsAssistant | null = null;
      let failed = false;

      try {
        this.state = 'connecting';
        ws = await this.getConnectedWebsocketAssistant(url, signal);
        this.state = 'subscribing';
        await this.subscribeToChannels(ws, tradingPairs, signal);
        this.state = 'streaming';
        await this.processWebsocketMessages(ws, signal);
      } catch (error) {
        if (isCancelledError(error) || signal.aborted) {
          this.state = 'disconnected';
          throw isCancelledError(error) ? error : new CancelledError();
        }
        failed = true;
        this.failures += 1;
        this.lastError = errorMessage(error);
        this.logger.error(
          JSON.stringify({
            event: 'stream_failed',
            provider: this.provider,
            url,
            message: this.lastError,
            retryInSeconds: this.reconnectDelayMs / 1000,
          }),
        );
      } finally {
        if (ws) {
          await this.releaseConnection(ws);
        }
      }

      if (failed) {
        this.state = 'error_backoff';
        try {
          await this.sleep(this.reconnectDelayMs, signal);
        } catch (error) {
          this.state = 'disconnected';
          throw error;
        }
        this.reconnects += 1;
      }
      this.state = 'disconnected';
    }
  }

  private async getConnectedWebsocketAssistant(url: string, signal: AbortSignal): Promise<WsAssistant> {
    const ws = this.wsAssistantFactory();
    try {
      await raceAbort(ws.connect(url, this.messageTimeoutMs, signal), signal);
    } catch (error) {
      await this.releaseConnection(ws);
      throw error;
    }
    this.logger.log(JSON.stringify({ event: 'stream_connected', provider: this.provider, url }));
    return ws;
  }

  private async releaseConnection(ws: WsAssistant): Promise<void> {
    try {
      await ws.disconnect();
    } catch (error) {
      this.logger.warn(
        JSON.stringify({ event: 'stream_release_failed', provider: this.provider, message: errorMessage(error) }),
      );
    }
  }

  private async processWebsocketMessages(ws: WsAssistant, signal: AbortSignal): Promise<never> {
    for (;;) {
      let payload: unknown;
      try {
        payload = await raceAbort(ws.receive(signal), signal);
      } catch (error) {
        if (error instanceof IdleTimeoutError) {
          this.logger.debug(JSON.stringify({ event: 'stream_idle_ping', provider: this.provider }));
          await raceAbort(ws.send(WS_PING_REQUEST), signal);
          continue;
        }
        throw error;
      }
      this.lastMessageTs = this.now();
      this.processMessage(payload);
    }
  }
}
