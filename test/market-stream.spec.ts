import Decimal from 'decimal.js';
import { ConfigService } from '@nestjs/config';
import { describe, expect, it, vi } from 'vitest';
import { RestRequest } from '@libs/market-data';
import {
  MarketStreamService,
  applyFundingUpdate,
} from '../apps/worker/src/market-stream/market-stream.service';
import { FakeRestAssistant, FakeWsAssistant, createDataSource, deferred } from './helpers/okx-fakes';

const restResponder = async (request: RestRequest): Promise<unknown> => {
  switch (new URL(request.url).pathname) {
    case '/api/v5/market/books':
      return { data: [{ ts: '1000', bids: [['10', '1'], ['9', '4']], asks: [['11', '2']] }] };
    case '/api/v5/market/index-tickers':
      return { data: [{ idxPx: '100' }] };
    case '/api/v5/public/mark-price':
      return { data: [{ markPx: '101' }] };
    case '/api/v5/public/funding-rate':
      return { data: [{ nextFundingTime: '2000', nextFundingRate: '0.0001' }] };
    default:
      throw new Error(`unexpected ${request.url}`);
  }
};

const streamFrames = [
  {
    arg: { channel: 'books', instId: 'BTC-USDT-SWAP' },
    action: 'update',
    data: [{ ts: '3000', bids: [['10', '0']], asks: [] }],
  },
  { topic: 'instruments.BTC-USDT-SWAP', type: 'delta', data: { update: [{ mark_price: '102.5' }] } },
  {
    arg: { channel: 'trades', instId: 'BTC-USDT-SWAP' },
    data: [{ instId: 'BTC-USDT-SWAP', tradeId: '9', px: '10', sz: '1', side: 'sell', ts: '3000' }],
  },
];

describe('MarketStreamService', () => {
  it('seeds books and funding, then applies stream events', async () => {
    const ready = deferred<void>();
    const ws = new FakeWsAssistant({ ready: ready.promise, frames: streamFrames });
    const restAssistant = new FakeRestAssistant(restResponder);
    const dataSource = createDataSource({ restAssistant, wsAssistantFactory: () => ws });
    const service = new MarketStreamService(
      new ConfigService({ MARKET_STREAM_ENABLED: true, MARKET_STREAM_TRADING_PAIRS: ['BTC-USDT'] }),
      dataSource,
    );

    service.onModuleInit();
    await vi.waitFor(() => expect(service.getHealth().funding['BTC-USDT']).toBeDefined());
    expect(service.getHealth().books).toEqual({
      'BTC-USDT': { updateId: 1_000_000, timestamp: 1, bidLevels: 2, askLevels: 1 },
    });

    ready.resolve();
    await vi.waitFor(() => expect(service.getHealth().received).toEqual({ trade: 1, diff: 1, funding: 1 }));

    const health = service.getHealth();
    expect(health.books).toEqual({
      'BTC-USDT': { updateId: 3_000_000, timestamp: 3, bidLevels: 1, askLevels: 0 },
    });
    expect(health.funding).toEqual({
      'BTC-USDT': { indexPrice: '100', markPrice: '102.5', rate: '0.0001', nextFundingUtcTimestamp: 2000 },
    });
    expect(health.stream.state).toBe('streaming');

    await service.onModuleDestroy();
    expect(service.getHealth().stream.state).toBe('disconnected');
    expect(ws.disconnectCalls).toBe(1);
  });

  it('stays idle when disabled', async () => {
    const restAssistant = new FakeRestAssistant(restResponder);
    let connections = 0;
    const dataSource = createDataSource({
      restAssistant,
      wsAssistantFactory: () => {
        connections += 1;
        return new FakeWsAssistant();
      },
    });
    const service = new MarketStreamService(new ConfigService({ MARKET_STREAM_ENABLED: false }), dataSource);

    service.onModuleInit();
    await service.onModuleDestroy();

    expect(service.getHealth()).toMatchObject({ enabled: false, received: { trade: 0, diff: 0, funding: 0 } });
    expect(restAssistant.requests).toEqual([]);
    expect(connections).toBe(0);
  });
});

describe('applyFundingUpdate', () => {
  it('overwrites only the fields present in the update', () => {
    const current = {
      tradingPair: 'ETH-USDT',
      indexPrice: new Decimal('2500'),
      markPrice: new Decimal('2501'),
      nextFundingUtcTimestamp: 1696147200,
      rate: new Decimal('0.0002'),
    };

    const next = applyFundingUpdate(current, { tradingPair: 'ETH-USDT', rate: new Decimal('-0.0001') });

    expect(next.indexPrice.toString()).toBe('2500');
    expect(next.markPrice.toString()).toBe('2501');
    expect(next.nextFundingUtcTimestamp).toBe(1696147200);
    expect(next.rate.toString()).toBe('-0.0001');
  });

  it('replaces a millisecond REST funding time with the seconds value from the stream', () => {
    const fromRest = {
      tradingPair: 'ETH-USDT',
      indexPrice: new Decimal('2500'),
      markPrice: new Decimal('2501'),
      nextFundingUtcTimestamp: 1696147200000,
      rate: new Decimal('0.0002'),
    };

    const next = applyFundingUpdate(fromRest, { tradingPair: 'ETH-USDT', nextFundingUtcTimestamp: 1696176000 });

    expect(fromRest.nextFundingUtcTimestamp).toBe(1696147200000);
    expect(next.nextFundingUtcTimestamp).toBe(1696176000);
  });
});
