import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  ChannelEventMap,
  ChannelKind,
  FundingInfo,
  FundingInfoUpdate,
  OKX_PERPETUAL_DATA_SOURCE,
  OkxPerpetualOrderBookDataSource,
  OrderBookMessage,
  ProviderSnapshot,
  errorMessage,
  isCancelledError,
} from '@libs/market-data';

export interface BookState {
  updateId: number;
  timestamp: number;
  bidLevels: number;
  askLevels: number;
}

export interface FundingState {
  indexPrice: string;
  markPrice: string;
  rate: string;
  nextFundingUtcTimestamp: number;
}

export interface MarketStreamHealth {
  enabled: boolean;
  stream: ProviderSnapshot;
  received: Record<ChannelKind, number>;
  lastEventAt: Record<ChannelKind, number | null>;
  books: Record<string, BookState>;
  funding: Record<string, FundingState>;
}

export const applyFundingUpdate = (current: FundingInfo, update: FundingInfoUpdate): FundingInfo => ({
  tradingPair: current.tradingPair,
  indexPrice: update.indexPrice ?? current.indexPrice,
  markPrice: update.markPrice ?? current.markPrice,
  rate: update.rate ?? current.rate,
  nextFundingUtcTimestamp: update.nextFundingUtcTimestamp ?? current.nextFundingUtcTimestamp,
});

@Injectable()
export class MarketStreamService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(MarketStreamService.name);
  private readonly enabled: boolean;
  private readonly tradingPairs: string[];
  private readonly received: Record<ChannelKind, number> = { trade: 0, diff: 0, funding: 0 };
  private readonly lastEventAt: Record<ChannelKind, number | null> = {
    trade: null,
    diff: null,
    funding: null,
  };
  private readonly books = new Map<string, BookState>();
  private readonly funding = new Map<string, FundingInfo>();
  private abortController: AbortController | null = null;
  private running: Promise<void> | null = null;

  constructor(
    private readonly configService: ConfigService,
    @Inject(OKX_PERPETUAL_DATA_SOURCE)
    private readonly dataSource: OkxPerpetualOrderBookDataSource,
  ) {
    this.enabled = this.configService.get<boolean>('MARKET_STREAM_ENABLED', true);
    this.tradingPairs = this.configService.get<string[]>('MARKET_STREAM_TRADING_PAIRS', [
      'BTC-USDT',
      'ETH-USDT',
    ]);
  }

  onModuleInit(): void {
    if (!this.enabled) {
      this.logger.log(JSON.stringify({ event: 'market_stream_disabled' }));
      return;
    }
    this.start();
  }

  async onModuleDestroy(): Promise<void> {
    await this.stop();
  }

  start(): void {
    if (this.running) {
      return;
    }
    const controller = new AbortController();
    this.abortController = controller;
    this.running = Promise.all([
      this.initializeBooks(controller.signal),
      this.stream(controller.signal),
      this.drain('trade', controller.signal, () => undefined),
      this.drain('diff', controller.signal, (diff) => this.applyBook(diff)),
      this.drain('funding', controller.signal, (update) => this.applyFunding(update)),
    ]).then(
      () => undefined,
      (error: unknown) => {
        this.logger.error(JSON.stringify({ event: 'market_stream_crashed', message: errorMessage(error) }));
      },
    );
  }

  async stop(): Promise<void> {
    this.abortController?.abort();
    if (this.running) {
      await this.running;
    }
    this.running = null;
    this.abortController = null;
  }

  getHealth(): MarketStreamHealth {
    const books: Record<string, BookState> = {};
    for (const [pair, book] of this.books) {
      books[pair] = { ...book };
    }
    const funding: Record<string, FundingState> = {};
    for (const [pair, info] of this.funding) {
      funding[pair] = {
        indexPrice: info.indexPrice.toString(),
        markPrice: info.markPrice.toString(),
        rate: info.rate.toString(),
        nextFundingUtcTimestamp: info.nextFundingUtcTimestamp,
      };
    }
    return {
      enabled: this.enabled,
      stream: this.dataSource.getSnapshot(),
      received: { ...this.received },
      lastEventAt: { ...this.lastEventAt },
      books,
      funding,
    };
  }

  private async initializeBooks(signal: AbortSignal): Promise<void> {
    for (const tradingPair of this.tradingPairs) {
      try {
        const [snapshot, fundingInfo] = await Promise.all([
          this.dataSource.fetchOrderBookSnapshot(tradingPair, signal),
          this.dataSource.fetchFundingInfo(tradingPair, signal),
        ]);
        this.applyBook(snapshot);
        this.funding.set(tradingPair, fundingInfo);
        this.logger.log(
          JSON.stringify({
            event: 'book_initialized',
            tradingPair,
            updateId: snapshot.updateId,
            bids: snapshot.bids.length,
            asks: snapshot.asks.length,
          }),
        );
      } catch (error) {
        if (isCancelledError(error)) {
          return;
        }
        this.logger.warn(
          JSON.stringify({ event: 'book_initialize_failed', tradingPair, message: errorMessage(error) }),
        );
      }
    }
  }

  private async stream(signal: AbortSignal): Promise<void> {
    try {
      await this.dataSource.listenForSubscriptions(signal);
    } catch (error) {
      if (isCancelledError(error)) {
        this.logger.log(JSON.stringify({ event: 'market_stream_stopped' }));
        return;
      }
      this.logger.error(JSON.stringify({ event: 'market_stream_crashed', message: errorMessage(error) }));
    }
  }

  private async drain<K extends ChannelKind>(
    kind: K,
    signal: AbortSignal,
    handle: (event: ChannelEventMap[K]) => void,
  ): Promise<void> {
    const queue = this.dataSource.queues[kind];
    for (;;) {
      let event: ChannelEventMap[K];
      try {
        event = await queue.get(signal);
      } catch (error) {
        if (isCancelledError(error)) {
          return;
        }
        throw error;
      }
      this.received[kind] += 1;
      this.lastEventAt[kind] = Date.now();
      handle(event);
    }
  }

  private applyBook(message: OrderBookMessage): void {
    const current = this.books.get(message.tradingPair);
    if (current && message.updateId <= current.updateId) {
      return;
    }
    this.books.set(message.tradingPair, {
      updateId: message.updateId,
      timestamp: message.timestamp,
      bidLevels: message.bids.length,
      askLevels: message.asks.length,
    });
  }

  private applyFunding(update: FundingInfoUpdate): void {
    const current = this.funding.get(update.tradingPair);
    if (!current) {
      this.logger.debug(JSON.stringify({ event: 'funding_update_before_init', tradingPair: update.tradingPair }));
      return;
    }
    this.funding.set(update.tradingPair, applyFundingUpdate(current, update));
  }
}
