import { describe, expect, it } from 'vitest';
import {
  MalformedResponseError,
  NonceCreator,
  OrderBookMessageType,
  TradeType,
  UnknownSymbolError,
  classifyOkxMessage,
  normalizeOkxFundingDelta,
  normalizeOkxFundingInfo,
  normalizeOkxOrderBookDiff,
  normalizeOkxOrderBookSnapshot,
  normalizeOkxTrades,
} from '@libs/market-data';
import { createRegistry } from './helpers/okx-fakes';

describe('classifyOkxMessage', () => {
  it('routes by arg.channel', () => {
    expect(classifyOkxMessage({ arg: { channel: 'trades', instId: 'BTC-USDT-SWAP' }, data: [] })).toBe('trade');
    expect(
      classifyOkxMessage({ arg: { channel: 'books', instId: 'BTC-USDT-SWAP' }, action: 'update', data: [] }),
    ).toBe('diff');
  });

  it('routes by topic with the instrument segment removed', () => {
    expect(classifyOkxMessage({ topic: 'instruments.BTC-USDT-SWAP', type: 'delta' })).toBe('funding');
    expect(classifyOkxMessage({ topic: 'instruments/BTC-USDT-SWAP', type: 'delta' })).toBe('funding');
    expect(classifyOkxMessage({ topic: 'books.l2.BTC-USDT-SWAP' })).toBe('unrouted');
  });

  it('never routes acknowledgements', () => {
    expect(classifyOkxMessage({ success: true, topic: 'instruments.BTC-USDT-SWAP' })).toBe('unrouted');
    expect(classifyOkxMessage({ success: false, arg: { channel: 'trades' } })).toBe('unrouted');
    expect(classifyOkxMessage({ event: 'subscribe', arg: { channel: 'books', instId: 'BTC-USDT-SWAP' } })).toBe(
      'unrouted',
    );
  });

  it('drops unknown channels and non-object frames', () => {
    expect(classifyOkxMessage({ arg: { channel: 'tickers', instId: 'BTC-USDT-SWAP' } })).toBe('unrouted');
    expect(classifyOkxMessage({ arg: { channel: 'toString' } })).toBe('unrouted');
    expect(classifyOkxMessage({ data: [] })).toBe('unrouted');
    expect(classifyOkxMessage('pong')).toBe('unrouted');
    expect(classifyOkxMessage(null)).toBe('unrouted');
  });
});

describe('normalizeOkxOrderBookSnapshot', () => {
  it('builds a snapshot from the REST depth response', () => {
    const payload = { data: [{ ts: '1000', bids: [['10', '1']], asks: [['11', '2']] }] };
    const snapshot = normalizeOkxOrderBookSnapshot(payload, 'BTC-USDT', NonceCreator.forMicroseconds());

    expect(snapshot).toEqual({
      type: OrderBookMessageType.SNAPSHOT,
      tradingPair: 'BTC-USDT',
      updateId: 1_000_000,
      bids: [[10, 1]],
      asks: [[11, 2]],
      timestamp: 1,
    });
  });

  it('keeps only price and size from each level', () => {
    const payload = { data: [{ ts: '2500', bids: [['10.5', '3', '0', '4']], asks: [] }] };
    const snapshot = normalizeOkxOrderBookSnapshot(payload, 'ETH-USDT', NonceCreator.forMicroseconds());

    expect(snapshot.bids).toEqual([[10.5, 3]]);
    expect(snapshot.asks).toEqual([]);
    expect(snapshot.timestamp).toBe(2.5);
  });

  it('rejects a response without data', () => {
    expect(() => normalizeOkxOrderBookSnapshot({ data: [] }, 'BTC-USDT', NonceCreator.forMicroseconds())).toThrow(
      MalformedResponseError,
    );
    expect(() =>
      normalizeOkxOrderBookSnapshot(
        { data: [{ ts: '1000', bids: [['abc', '1']], asks: [] }] },
        'BTC-USDT',
        NonceCreator.forMicroseconds(),
      ),
    ).toThrow(/^Malformed order book snapshot: data\.0\.bids\.0\.0: /);
  });
});

describe('normalizeOkxOrderBookDiff', () => {
  const diffPayload = {
    arg: { channel: 'books', instId: 'BTC-USDT-SWAP' },
    action: 'update',
    data: [
      { ts: '3000', bids: [['100.5', '2', '0', '1']], asks: [['101', '0', '0', '0']] },
      { ts: '9000', bids: [['1', '1']], asks: [] },
    ],
  };

  it('reads only the first data record', () => {
    const diff = normalizeOkxOrderBookDiff(diffPayload, createRegistry(), NonceCreator.forMicroseconds());

    expect(diff).toEqual({
      type: OrderBookMessageType.DIFF,
      tradingPair: 'BTC-USDT',
      updateId: 3_000_000,
      bids: [[100.5, 2]],
      asks: [[101, 0]],
      timestamp: 3,
    });
  });

  it('assigns increasing ids to diffs with the same timestamp', () => {
    const nonceCreator = NonceCreator.forMicroseconds();
    const registry = createRegistry();
    const first = normalizeOkxOrderBookDiff(diffPayload, registry, nonceCreator);
    const second = normalizeOkxOrderBookDiff(diffPayload, registry, nonceCreator);

    expect(first?.updateId).toBe(3_000_000);
    expect(second?.updateId).toBe(3_000_001);
  });

  it('ignores actions other than update', () => {
    const payload = { ...diffPayload, action: 'snapshot' };
    expect(normalizeOkxOrderBookDiff(payload, createRegistry(), NonceCreator.forMicroseconds())).toBeNull();
  });
});

describe('normalizeOkxTrades', () => {
  it('emits one trade per data entry in order', () => {
    const payload = {
      arg: { channel: 'trades', instId: 'BTC-USDT-SWAP' },
      data: [
        { instId: 'BTC-USDT-SWAP', tradeId: '130639474', px: '42219.9', sz: '0.12', side: 'buy', ts: '1500' },
        { instId: 'BTC-USDT-SWAP', tradeId: '130639475', px: '42219.8', sz: '3', side: 'sell', ts: '1750' },
      ],
    };

    expect(normalizeOkxTrades(payload, createRegistry())).toEqual([
      {
        type: OrderBookMessageType.TRADE,
        tradingPair: 'BTC-USDT',
        tradeId: '130639474',
        tradeType: TradeType.BUY,
        amount: 0.12,
        price: 42219.9,
        timestamp: 1.5,
      },
      {
        type: OrderBookMessageType.TRADE,
        tradingPair: 'BTC-USDT',
        tradeId: '130639475',
        tradeType: TradeType.SELL,
        amount: 3,
        price: 42219.8,
        timestamp: 1.75,
      },
    ]);
  });

  it('returns nothing for an empty batch', () => {
    expect(normalizeOkxTrades({ arg: { channel: 'trades' }, data: [] }, createRegistry())).toEqual([]);
  });

  it('rejects the whole batch when one entry is malformed', () => {
    const payload = {
      data: [
        { instId: 'BTC-USDT-SWAP', tradeId: '1', px: '1', sz: '1', side: 'buy', ts: '1000' },
        { instId: 'BTC-USDT-SWAP', tradeId: '2', px: '1', sz: '1', side: 'hold', ts: '1000' },
      ],
    };
    expect(() => normalizeOkxTrades(payload, createRegistry())).toThrow(MalformedResponseError);
  });

  it('surfaces untranslatable instruments', () => {
    const payload = {
      data: [{ instId: 'BTC-USDT-240329', tradeId: '1', px: '1', sz: '1', side: 'buy', ts: '1000' }],
    };
    expect(() => normalizeOkxTrades(payload, createRegistry())).toThrow(UnknownSymbolError);
  });
});

describe('normalizeOkxFundingDelta', () => {
  it('keeps absent fields absent', () => {
    const payload = {
      topic: 'instruments.BTC-USDT-SWAP',
      type: 'delta',
      data: {
        update: [
          {
            index_price: '100',
            mark_price: '101',
            next_funding_time: '2023-10-01 08:00:00',
            predicted_funding_rate_e6: '100',
          },
          { mark_price: '102.5' },
        ],
      },
    };
    const [full, sparse] = normalizeOkxFundingDelta(payload, createRegistry());

    expect(full.tradingPair).toBe('BTC-USDT');
    expect(full.indexPrice?.toString()).toBe('100');
    expect(full.markPrice?.toString()).toBe('101');
    expect(full.nextFundingUtcTimestamp).toBe(1696147200);
    expect(full.rate?.toString()).toBe('0.0001');
    expect(Object.keys(sparse)).toEqual(['tradingPair', 'markPrice']);
    expect(sparse.markPrice?.toString()).toBe('102.5');
  });

  it('accepts ISO and epoch millisecond funding times', () => {
    const payload = {
      topic: 'instruments/ETH-USDT-SWAP',
      type: 'delta',
      data: {
        update: [{ next_funding_time: '2023-10-01T08:00:00Z' }, { next_funding_time: '1696147200000' }],
      },
    };
    const updates = normalizeOkxFundingDelta(payload, createRegistry());

    expect(updates.map((update) => update.nextFundingUtcTimestamp)).toEqual([1696147200, 1696147200]);
    expect(updates.map((update) => update.tradingPair)).toEqual(['ETH-USDT', 'ETH-USDT']);
  });

  it('ignores messages that are not deltas', () => {
    const payload = { topic: 'instruments.BTC-USDT-SWAP', type: 'snapshot', data: { update: [] } };
    expect(normalizeOkxFundingDelta(payload, createRegistry())).toEqual([]);
  });
});

describe('normalizeOkxFundingInfo', () => {
  it('combines index, mark and funding responses', () => {
    const info = normalizeOkxFundingInfo(
      [
        { code: '0', data: [{ idxPx: '100' }] },
        { code: '0', data: [{ markPx: '101' }] },
        { code: '0', data: [{ nextFundingTime: '2000', nextFundingRate: '0.0001' }] },
      ],
      'BTC-USDT',
    );

    expect(info.tradingPair).toBe('BTC-USDT');
    expect(info.indexPrice.toString()).toBe('100');
    expect(info.markPrice.toString()).toBe('101');
    expect(info.nextFundingUtcTimestamp).toBe(2000);
    expect(info.rate.toString()).toBe('0.0001');
  });

  it('names the response that failed validation', () => {
    expect(() =>
      normalizeOkxFundingInfo(
        [{ data: [{ idxPx: '100' }] }, { data: [] }, { data: [{ nextFundingTime: '2000', nextFundingRate: '0' }] }],
        'BTC-USDT',
      ),
    ).toThrow(/^Malformed mark price: data: /);
  });
});
