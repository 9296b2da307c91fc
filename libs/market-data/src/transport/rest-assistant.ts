import { Logger } from '@nestjs/common';
import axios, { AxiosInstance } from 'axios';
import { CancelledError, TransportError, errorMessage } from '../errors';
import { RestAssistant, RestRequest } from '../interfaces';
import { isRecord } from '../utils/guards';
import { RequestSigner } from './okx-request-signer';

export class AxiosRestAssistant implements RestAssistant {
  private readonly logger = new Logger(AxiosRestAssistant.name);

  constructor(
    private readonly client: AxiosInstance,
    private readonly signer: RequestSigner | null = null,
  ) {}

  async execute(request: RestRequest): Promise<unknown> {
    const query = new URLSearchParams(request.params ?? {}).toString();
    const url = query ? `${request.url}?${query}` : request.url;
    const body = request.data === undefined ? '' : JSON.stringify(request.data);
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };

    if (request.isAuthRequired) {
      if (this.signer) {
        const { pathname, search } = new URL(url);
        Object.assign(headers, this.signer.sign(request.method, `${pathname}${search}`, body));
      } else {
        this.logger.debug(
          JSON.stringify({ event: 'rest_request_unsigned', limitId: request.throttlerLimitId }),
        );
      }
    }

    this.logger.verbose(
      JSON.stringify({ event: 'rest_request', method: request.method, url, limitId: request.throttlerLimitId }),
    );

    let payload: unknown;
    try {
      const response = await this.client.request<unknown>({
        url,
        method: request.method,
        data: body || undefined,
        headers,
        signal: request.signal,
      });
      payload = response.data;
    } catch (error) {
      if (axios.isCancel(error) || request.signal?.aborted) {
        throw new CancelledError();
      }
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      throw new TransportError(`${request.method} ${request.url} failed: ${errorMessage(error)}`, {
        url: request.url,
        throttlerLimitId: request.throttlerLimitId,
        status,
        cause: error,
      });
    }

    if (isRecord(payload) && typeof payload.code === 'string' && payload.code !== '0') {
      const msg = typeof payload.msg === 'string' ? payload.msg : 'unknown error';
      throw new TransportError(`${request.method} ${request.url} rejected: code ${payload.code} ${msg}`, {
        url: request.url,
        throttlerLimitId: request.throttlerLimitId,
      });
    }

    return payload;
  }
}

/** Shared axios instance for one REST host; requests abort after `timeoutMs`. */
export const createHttpClient = (baseURL: string, timeoutMs: number): AxiosInstance =>
  axios.create({
    baseURL,
    timeout: timeoutMs,
    headers: { 'User-Agent': 'perp-market-stream/1.0' },
  });
