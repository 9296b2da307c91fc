import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { InstrumentRegistryService } from './instrument-registry.service';
import { NonceCreator } from './nonce-creator';
import { OkxPerpetualOrderBookDataSource } from './providers/okx-perpetual/okx-perpetual-order-book-data-source';
import {
  getOkxCredentials,
  getProviderEndpoints,
} from './providers/providers.config';
import { OkxRequestSigner } from './transport/okx-request-signer';
import { AxiosRestAssistant, createHttpClient } from './transport/rest-assistant';
import { WebSocketAssistant } from './transport/ws-assistant';

export const OKX_PERPETUAL_DATA_SOURCE = Symbol('OKX_PERPETUAL_DATA_SOURCE');

export const createOkxPerpetualDataSource = (
  configService: ConfigService,
  instrumentRegistry: InstrumentRegistryService,
): OkxPerpetualOrderBookDataSource => {
  instrumentRegistry.setTradingPairs(
    configService.get<string[]>('MARKET_STREAM_TRADING_PAIRS', ['BTC-USDT', 'ETH-USDT']),
  );
  const endpoints = getProviderEndpoints(configService);
  const credentials = getOkxCredentials(configService);
  const client = createHttpClient(
    endpoints.rest,
    configService.get<number>('MARKET_DATA_REST_TIMEOUT_MS', 10_000),
  );
  const connectTimeoutMs = configService.get<number>('MARKET_STREAM_CONNECT_TIMEOUT_MS', 10_000);

  return new OkxPerpetualOrderBookDataSource({
    tradingPairs: instrumentRegistry.getTradingPairs(),
    restAssistant: new AxiosRestAssistant(
      client,
      credentials ? new OkxRequestSigner(credentials) : null,
    ),
    wsAssistantFactory: () => new WebSocketAssistant({ connectTimeoutMs }),
    translator: instrumentRegistry,
    endpoints,
    nonceCreator: NonceCreator.forMicroseconds(),
    messageTimeoutSeconds: configService.get<number>('MARKET_STREAM_MESSAGE_TIMEOUT_SECONDS', 25),
    reconnectDelaySeconds: configService.get<number>('MARKET_STREAM_RECONNECT_DELAY_SECONDS', 5),
    subscribePacingMs: configService.get<number>('MARKET_STREAM_SUBSCRIBE_PACING_MS', 400),
  });
};

@Module({
  imports: [ConfigModule],
  providers: [
    InstrumentRegistryService,
    {
      provide: OKX_PERPETUAL_DATA_SOURCE,
      useFactory: createOkxPerpetualDataSource,
      inject: [ConfigService, InstrumentRegistryService],
    },
  ],
  exports: [InstrumentRegistryService, OKX_PERPETUAL_DATA_SOURCE],
})
export class MarketDataModule {}
