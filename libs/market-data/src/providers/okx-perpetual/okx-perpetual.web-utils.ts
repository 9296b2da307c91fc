import { RestMethod } from '../../interfaces';
import {
  DEFAULT_DOMAIN,
  OkxPerpetualDomain,
  REST_URLS,
  WSS_PUBLIC_URLS,
} from './okx-perpetual.constants';

export interface OkxPerpetualEndpoints {
  rest: string;
  ws: string;
}

export const getOkxPerpetualEndpoints = (
  domain: OkxPerpetualDomain = DEFAULT_DOMAIN,
  overrides: Partial<OkxPerpetualEndpoints> = {},
): OkxPerpetualEndpoints => ({
  rest: (overrides.rest ?? REST_URLS[domain]).replace(/\/+$/, ''),
  ws: overrides.ws ?? WSS_PUBLIC_URLS[domain],
});

export const getRestUrlForEndpoint = (endpoint: string, endpoints: OkxPerpetualEndpoints): string =>
  `${endpoints.rest}${endpoint}`;

/**
 * Per-endpoint limit id. Endpoints limited per instrument get the pair appended.
 */
export const getRestApiLimitIdForEndpoint = (
  endpoint: string,
  tradingPair?: string,
  method: RestMethod = 'GET',
): string => {
  const limitId = `${method}${endpoint}`;
  return tradingPair ? `${limitId}-${tradingPair}` : limitId;
};
