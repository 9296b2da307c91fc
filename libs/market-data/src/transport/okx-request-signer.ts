import crypto from 'crypto';
import { RestMethod } from '../interfaces';

export interface OkxCredentials {
  apiKey: string;
  secretKey: string;
  passphrase: string;
}

export interface RequestSigner {
  sign(method: RestMethod, requestPath: string, body: string): Record<string, string>;
}

/**
 * OK-ACCESS-SIGN = base64(hmacSha256(timestamp + method + requestPath + body)).
 * `requestPath` includes the query string for GET requests.
 */
export class OkxRequestSigner implements RequestSigner {
  constructor(
    private readonly credentials: OkxCredentials,
    private readonly now: () => Date = () => new Date(),
  ) {}

  sign(method: RestMethod, requestPath: string, body: string): Record<string, string> {
    const timestamp = this.now().toISOString();
    const signature = crypto
      .createHmac('sha256', this.credentials.secretKey)
      .update(`${timestamp}${method}${requestPath}${body}`)
      .digest('base64');

    return {
      'OK-ACCESS-KEY': this.credentials.apiKey,
      'OK-ACCESS-SIGN': signature,
      'OK-ACCESS-TIMESTAMP': timestamp,
      'OK-ACCESS-PASSPHRASE': this.credentials.passphrase,
    };
  }
}
