import { ConfigService } from '@nestjs/config';
import { DEFAULT_DOMAIN, OkxPerpetualDomain } from './okx-perpetual/okx-perpetual.constants';
import {
  OkxPerpetualEndpoints,
  getOkxPerpetualEndpoints,
} from './okx-perpetual/okx-perpetual.web-utils';
import { OkxCredentials } from '../transport/okx-request-signer';

const DOMAINS: OkxPerpetualDomain[] = ['okx_perpetual', 'okx_perpetual_aws'];

const isDomain = (value: string): value is OkxPerpetualDomain =>
  DOMAINS.some((domain) => domain === value);

export const getOkxPerpetualDomain = (configService: ConfigService): OkxPerpetualDomain => {
  const raw = configService.get<string>('OKX_PERPETUAL_DOMAIN', DEFAULT_DOMAIN);
  return isDomain(raw) ? raw : DEFAULT_DOMAIN;
};

export const getProviderEndpoints = (configService: ConfigService): OkxPerpetualEndpoints => {
  const restOverride = configService.get<string>('OKX_PERPETUAL_REST_URL');
  const wsOverride = configService.get<string>('OKX_PERPETUAL_WS_URL');
  return getOkxPerpetualEndpoints(getOkxPerpetualDomain(configService), {
    rest: restOverride || undefined,
    ws: wsOverride || undefined,
  });
};

export const getOkxCredentials = (configService: ConfigService): OkxCredentials | null => {
  const apiKey = configService.get<string>('OKX_API_KEY');
  const secretKey = configService.get<string>('OKX_SECRET_KEY');
  const passphrase = configService.get<string>('OKX_PASSPHRASE');
  if (!apiKey || !secretKey || !passphrase) {
    return null;
  }
  return { apiKey, secretKey, passphrase };
};
