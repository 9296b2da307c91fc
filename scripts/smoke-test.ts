import 'dotenv/config';
import {
  CancelledError,
  InstrumentRegistryService,
  NonceCreator,
  OkxPerpetualOrderBookDataSource,
  AxiosRestAssistant,
  WebSocketAssistant,
  createHttpClient,
  getOkxPerpetualEndpoints,
  isCancelledError,
} from '@libs/market-data';

const TARGET_EVENTS = 5;
const TIMEOUT_MS = 30_000;

const main = async (): Promise<void> => {
  const tradingPair = process.env.SMOKE_TRADING_PAIR ?? 'BTC-USDT';
  const endpoints = getOkxPerpetualEndpoints(undefined, {
    rest: process.env.OKX_PERPETUAL_REST_URL || undefined,
    ws: process.env.OKX_PERPETUAL_WS_URL || undefined,
  });
  const registry = new InstrumentRegistryService();
  registry.setTradingPairs([tradingPair]);

  const dataSource = new OkxPerpetualOrderBookDataSource({
    tradingPairs: registry.getTradingPairs(),
    restAssistant: new AxiosRestAssistant(createHttpClient(endpoints.rest, 10_000)),
    wsAssistantFactory: () => new WebSocketAssistant({ connectTimeoutMs: 10_000 }),
    translator: registry,
    endpoints,
    nonceCreator: NonceCreator.forMicroseconds(),
  });

  const snapshot = await dataSource.fetchOrderBookSnapshot(tradingPair);
  console.info(`✅ Snapshot OK: ${snapshot.bids.length} bids / ${snapshot.asks.length} asks`);

  const funding = await dataSource.fetchFundingInfo(tradingPair);
  console.info(`✅ Funding OK: mark ${funding.markPrice.toString()} rate ${funding.rate.toString()}`);

  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), TIMEOUT_MS);
  const streaming = dataSource.listenForSubscriptions(controller.signal).catch((error: unknown) => {
    if (!isCancelledError(error)) {
      throw error;
    }
  });

  try {
    for (let received = 0; received < TARGET_EVENTS; received += 1) {
      const diff = await dataSource.queues.diff.get(controller.signal);
      console.info(`diff ${diff.tradingPair} #${diff.updateId} (${diff.bids.length}/${diff.asks.length})`);
    }
    console.info('✅ Stream OK');
  } catch (error) {
    if (error instanceof CancelledError) {
      throw new Error(`No ${TARGET_EVENTS} diffs within ${TIMEOUT_MS}ms`);
    }
    throw error;
  } finally {
    clearTimeout(timer);
    controller.abort();
    await streaming;
  }
};

main().catch((error) => {
  console.error('Smoke test failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
