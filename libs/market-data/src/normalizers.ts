import { ZodTypeAny, z } from 'zod';
import { MalformedResponseError } from './errors';
import { SymbolTranslator } from './interfaces';
import {
  ChannelRoute,
  FundingInfo,
  FundingInfoUpdate,
  OrderBookMessage,
  OrderBookMessageType,
  TradeMessage,
  TradeType,
} from './models';
import { NonceCreator } from './nonce-creator';
import {
  DIFF_EVENT_TYPE,
  FUNDING_EVENT_TYPE,
  WS_INSTRUMENTS_INFO_CHANNEL,
  WS_ORDER_BOOK_400_DEPTH_100_MS_EVENTS_CHANNEL,
  WS_TRADES_CHANNEL,
} from './providers/okx-perpetual/okx-perpetual.constants';
import {
  fundingDeltaMessage,
  fundingRateResponse,
  indexTickerResponse,
  markPriceResponse,
  orderBookDiffMessage,
  orderBookSnapshotResponse,
  tradeMessage,
} from './providers/okx-perpetual/okx-perpetual.schemas';
import { isRecord } from './utils/guards';

const TOPIC_DELIMITER = /[./]/;

export const parseWith = <Schema extends ZodTypeAny>(
  schema: Schema,
  payload: unknown,
  context: string,
): z.output<Schema> => {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw MalformedResponseError.fromZodError(context, result.error);
  }
  return result.data;
};

const msToSeconds = (ms: number): number => ms / 1000;

const instIdFromTopic = (topic: string): string => {
  const segments = topic.split(TOPIC_DELIMITER);
  return segments[segments.length - 1] ?? '';
};

const channelFromTopic = (topic: string): string => topic.split(TOPIC_DELIMITER).slice(0, -1).join('.');

const CHANNEL_ROUTES: Record<string, ChannelRoute> = {
  [WS_TRADES_CHANNEL]: 'trade',
  [WS_ORDER_BOOK_400_DEPTH_100_MS_EVENTS_CHANNEL]: 'diff',
  [WS_INSTRUMENTS_INFO_CHANNEL]: 'funding',
};

/**
 * Routes a stream frame to its output channel. Acks (`success` or `event`
 * key), text frames and channels we never subscribed to are `unrouted`.
 */
export const classifyOkxMessage = (payload: unknown): ChannelRoute => {
  if (!isRecord(payload) || 'success' in payload || 'event' in payload) {
    return 'unrouted';
  }

  let channel: string | null = null;
  if (typeof payload.topic === 'string') {
    channel = channelFromTopic(payload.topic);
  } else if (isRecord(payload.arg) && typeof payload.arg.channel === 'string') {
    channel = payload.arg.channel;
  }
  if (channel === null || !Object.prototype.hasOwnProperty.call(CHANNEL_ROUTES, channel)) {
    return 'unrouted';
  }
  return CHANNEL_ROUTES[channel];
};

export const normalizeOkxOrderBookSnapshot = (
  payload: unknown,
  tradingPair: string,
  nonceCreator: NonceCreator,
): OrderBookMessage => {
  const [snapshot] = parseWith(orderBookSnapshotResponse, payload, 'order book snapshot').data;
  const timestamp = msToSeconds(snapshot.ts);
  return {
    type: OrderBookMessageType.SNAPSHOT,
    tradingPair,
    updateId: nonceCreator.getTrackingNonce(timestamp),
    bids: snapshot.bids,
    asks: snapshot.asks,
    timestamp,
  };
};

/**
 * Only `update` frames become diffs, and only the first data record is read:
 * the exchange sends one depth update per frame.
 */
export const normalizeOkxOrderBookDiff = (
  payload: unknown,
  translator: SymbolTranslator,
  nonceCreator: NonceCreator,
): OrderBookMessage | null => {
  if (!isRecord(payload) || payload.action !== DIFF_EVENT_TYPE) {
    return null;
  }
  const message = parseWith(orderBookDiffMessage, payload, 'order book diff');
  const [diff] = message.data;
  const timestamp = msToSeconds(diff.ts);
  return {
    type: OrderBookMessageType.DIFF,
    tradingPair: translator.toCanonical(message.arg.instId),
    updateId: nonceCreator.getTrackingNonce(timestamp),
    bids: diff.bids,
    asks: diff.asks,
    timestamp,
  };
};

export const normalizeOkxTrades = (payload: unknown, translator: SymbolTranslator): TradeMessage[] => {
  const message = parseWith(tradeMessage, payload, 'trade message');
  return message.data.map((trade) => ({
    type: OrderBookMessageType.TRADE,
    tradingPair: translator.toCanonical(trade.instId),
    tradeId: trade.tradeId,
    tradeType: trade.side === 'buy' ? TradeType.BUY : TradeType.SELL,
    amount: trade.sz,
    price: trade.px,
    timestamp: msToSeconds(trade.ts),
  }));
};

export const normalizeOkxFundingDelta = (
  payload: unknown,
  translator: SymbolTranslator,
): FundingInfoUpdate[] => {
  if (!isRecord(payload) || payload.type !== FUNDING_EVENT_TYPE) {
    return [];
  }
  const message = parseWith(fundingDeltaMessage, payload, 'funding delta');
  const tradingPair = translator.toCanonical(instIdFromTopic(message.topic));

  return message.data.update.map((entry) => {
    const update: FundingInfoUpdate = { tradingPair };
    if (entry.index_price !== undefined) {
      update.indexPrice = entry.index_price;
    }
    if (entry.mark_price !== undefined) {
      update.markPrice = entry.mark_price;
    }
    if (entry.next_funding_time !== undefined) {
      update.nextFundingUtcTimestamp = entry.next_funding_time;
    }
    if (entry.predicted_funding_rate_e6 !== undefined) {
      update.rate = entry.predicted_funding_rate_e6.times('1e-6');
    }
    return update;
  });
};

export const normalizeOkxFundingInfo = (
  responses: [indexTicker: unknown, markPrice: unknown, fundingRate: unknown],
  tradingPair: string,
): FundingInfo => {
  const [index] = parseWith(indexTickerResponse, responses[0], 'index ticker').data;
  const [mark] = parseWith(markPriceResponse, responses[1], 'mark price').data;
  const [funding] = parseWith(fundingRateResponse, responses[2], 'funding rate').data;

  return {
    tradingPair,
    indexPrice: index.idxPx,
    markPrice: mark.markPx,
    nextFundingUtcTimestamp: funding.nextFundingTime,
    rate: funding.nextFundingRate,
  };
};
