export type RestMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface RestRequest {
  url: string;
  method: RestMethod;
  params?: Record<string, string>;
  data?: unknown;
  throttlerLimitId: string;
  isAuthRequired?: boolean;
  signal?: AbortSignal;
}

export interface RestAssistant {
  execute(request: RestRequest): Promise<unknown>;
}

export interface WsAssistant {
  connect(url: string, messageTimeoutMs: number, signal?: AbortSignal): Promise<void>;
  /** Objects are sent as JSON text, strings as-is. */
  send(payload: unknown): Promise<void>;
  /**
   * Resolves with the next frame (parsed JSON, or the raw text when it is not JSON).
   * Rejects with IdleTimeoutError when nothing arrives within the message timeout.
   */
  receive(signal?: AbortSignal): Promise<unknown>;
  disconnect(): Promise<void>;
}

export type WsAssistantFactory = () => WsAssistant;

export interface SymbolTranslator {
  toNative(tradingPair: string): string;
  toCanonical(instId: string): string;
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;
