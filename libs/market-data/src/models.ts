import Decimal from 'decimal.js';

export enum TradeType {
  BUY = 1,
  SELL = 2,
}

export enum OrderBookMessageType {
  SNAPSHOT = 1,
  DIFF = 2,
  TRADE = 3,
}

export type PriceLevel = [price: number, size: number];

export interface OrderBookMessage {
  type: OrderBookMessageType.SNAPSHOT | OrderBookMessageType.DIFF;
  tradingPair: string;
  updateId: number;
  bids: PriceLevel[];
  asks: PriceLevel[];
  /** Exchange event time in seconds. */
  timestamp: number;
}

export interface TradeMessage {
  type: OrderBookMessageType.TRADE;
  tradingPair: string;
  tradeId: string;
  tradeType: TradeType;
  amount: number;
  price: number;
  timestamp: number;
}

export interface FundingInfo {
  tradingPair: string;
  indexPrice: Decimal;
  markPrice: Decimal;
  nextFundingUtcTimestamp: number;
  rate: Decimal;
}

/**
 * Partial funding change. A key that is absent means "unchanged", never zero.
 */
export interface FundingInfoUpdate {
  tradingPair: string;
  indexPrice?: Decimal;
  markPrice?: Decimal;
  nextFundingUtcTimestamp?: number;
  rate?: Decimal;
}

export interface ChannelEventMap {
  trade: TradeMessage;
  diff: OrderBookMessage;
  funding: FundingInfoUpdate;
}

export type ChannelKind = keyof ChannelEventMap;

export type ChannelRoute = ChannelKind | 'unrouted';

export interface SubscriptionArg {
  channel: string;
  instId: string;
}

export interface SubscribeRequest {
  op: 'subscribe';
  args: SubscriptionArg[];
}

export type StreamState =
  | 'disconnected'
  | 'connecting'
  | 'subscribing'
  | 'streaming'
  | 'error_backoff';

export interface ProviderSnapshot {
  provider: string;
  state: StreamState;
  connected: boolean;
  lastMessageTs: number | null;
  reconnects: number;
  failures: number;
  droppedMessages: number;
  lastError?: string | null;
}
