export * from './errors';
export * from './instrument-registry.service';
export * from './interfaces';
export * from './market-data.module';
export * from './message-queue';
export * from './models';
export * from './nonce-creator';
export * from './normalizers';
export * from './symbol-mapper';
export * from './providers/okx-perpetual/okx-perpetual.constants';
export * from './providers/okx-perpetual/okx-perpetual.web-utils';
export * from './providers/okx-perpetual/okx-perpetual-order-book-data-source';
export * from './providers/providers.config';
export * from './transport/okx-request-signer';
export * from './transport/rest-assistant';
export * from './transport/ws-assistant';
export * from './utils/abort.util';
