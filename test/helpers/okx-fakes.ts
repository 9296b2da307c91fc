import {
  CancelledError,
  InstrumentRegistryService,
  OkxPerpetualOrderBookDataSource,
  OkxPerpetualDataSourceOptions,
  RestAssistant,
  RestRequest,
  Sleep,
  WsAssistant,
} from '@libs/market-data';

export type RestResponder = (request: RestRequest) => Promise<unknown>;

export class FakeRestAssistant implements RestAssistant {
  readonly requests: RestRequest[] = [];

  constructor(private readonly responder: RestResponder) {}

  execute(request: RestRequest): Promise<unknown> {
    this.requests.push(request);
    return this.responder(request);
  }
}

const pendingUntilAbort = (signal?: AbortSignal): Promise<never> =>
  new Promise<never>((_, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    signal?.addEventListener('abort', () => reject(new CancelledError()), { once: true });
  });

export interface FakeWsOptions {
  /** Frames handed out by receive(); an Error instance is thrown instead. */
  frames?: unknown[];
  connectError?: Error;
  sendError?: Error;
  disconnectError?: Error;
  /** receive() waits for this before handing out the first frame. */
  ready?: Promise<void>;
}

export class FakeWsAssistant implements WsAssistant {
  readonly sent: unknown[] = [];
  readonly connectCalls: Array<{ url: string; messageTimeoutMs: number }> = [];
  disconnectCalls = 0;
  private readonly frames: unknown[];

  constructor(private readonly options: FakeWsOptions = {}) {
    this.frames = [...(options.frames ?? [])];
  }

  async connect(url: string, messageTimeoutMs: number): Promise<void> {
    this.connectCalls.push({ url, messageTimeoutMs });
    if (this.options.connectError) {
      throw this.options.connectError;
    }
  }

  async send(payload: unknown): Promise<void> {
    if (this.options.sendError) {
      throw this.options.sendError;
    }
    this.sent.push(payload);
  }

  async receive(signal?: AbortSignal): Promise<unknown> {
    if (this.options.ready) {
      await this.options.ready;
    }
    if (this.frames.length === 0) {
      return pendingUntilAbort(signal);
    }
    const frame = this.frames.shift();
    if (frame instanceof Error) {
      throw frame;
    }
    return frame;
  }

  async disconnect(): Promise<void> {
    this.disconnectCalls += 1;
    if (this.options.disconnectError) {
      throw this.options.disconnectError;
    }
  }
}

export interface RecordingSleep {
  sleep: Sleep;
  calls: number[];
}

/** Resolves at once; records every requested delay. */
export const immediateSleep = (): RecordingSleep => {
  const calls: number[] = [];
  const sleep: Sleep = async (ms, signal) => {
    calls.push(ms);
    if (signal?.aborted) {
      throw new CancelledError();
    }
  };
  return { sleep, calls };
};

/** Never resolves; rejects once the signal aborts. */
export const blockingSleep = (onSleep: (ms: number) => void): Sleep => (ms, signal) => {
  onSleep(ms);
  return pendingUntilAbort(signal);
};

export const createRegistry = (pairs: string[] = ['BTC-USDT', 'ETH-USDT']): InstrumentRegistryService => {
  const registry = new InstrumentRegistryService();
  registry.setTradingPairs(pairs);
  return registry;
};

export const createDataSource = (
  overrides: Partial<OkxPerpetualDataSourceOptions> = {},
): OkxPerpetualOrderBookDataSource =>
  new OkxPerpetualOrderBookDataSource({
    tradingPairs: ['BTC-USDT'],
    restAssistant: new FakeRestAssistant(async () => ({ code: '0', data: [] })),
    wsAssistantFactory: () => new FakeWsAssistant(),
    translator: createRegistry(),
    sleep: immediateSleep().sleep,
    subscribePacingMs: 0,
    ...overrides,
  });

export const deferred = <T>(): {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
} => {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
};
