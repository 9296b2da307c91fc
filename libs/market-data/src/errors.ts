import { ZodError } from 'zod';

export class TransportError extends Error {
  readonly url?: string;
  readonly throttlerLimitId?: string;
  readonly status?: number;

  constructor(
    message: string,
    details: { url?: string; throttlerLimitId?: string; status?: number; cause?: unknown } = {},
  ) {
    super(message, { cause: details.cause });
    this.name = 'TransportError';
    this.url = details.url;
    this.throttlerLimitId = details.throttlerLimitId;
    this.status = details.status;
  }
}

export class IdleTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`No message received within ${timeoutMs}ms`);
    this.name = 'IdleTimeoutError';
  }
}

export class MalformedResponseError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(issues.length ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'MalformedResponseError';
  }

  static fromZodError(context: string, error: ZodError): MalformedResponseError {
    const issues = error.issues.map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '<root>';
      return `${path}: ${issue.message}`;
    });
    return new MalformedResponseError(`Malformed ${context}`, issues);
  }
}

export class CancelledError extends Error {
  constructor(message = 'Operation cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

export class UnknownSymbolError extends Error {
  constructor(readonly symbol: string) {
    super(`No trading pair mapping for ${symbol}`);
    this.name = 'UnknownSymbolError';
  }
}

export const isCancelledError = (error: unknown): error is CancelledError =>
  error instanceof CancelledError;

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
