import { Injectable, Logger } from '@nestjs/common';
import { UnknownSymbolError } from './errors';
import { SymbolTranslator } from './interfaces';
import {
  normalizeTradingPair,
  swapInstIdFromTradingPair,
  tradingPairFromSwapInstId,
} from './symbol-mapper';

export interface InstrumentMapping {
  tradingPair: string;
  instId: string;
}

@Injectable()
export class InstrumentRegistryService implements SymbolTranslator {
  private readonly logger = new Logger(InstrumentRegistryService.name);
  private readonly byPair = new Map<string, InstrumentMapping>();
  private readonly byInstId = new Map<string, InstrumentMapping>();

  setTradingPairs(pairs: string[]): void {
    this.byPair.clear();
    this.byInstId.clear();

    for (const raw of pairs) {
      const tradingPair = normalizeTradingPair(raw);
      const instId = tradingPair ? swapInstIdFromTradingPair(tradingPair) : null;
      if (!tradingPair || !instId) {
        this.logger.warn(JSON.stringify({ event: 'symbol_mapping_skipped', symbol: raw }));
        continue;
      }
      const mapping = { tradingPair, instId };
      this.byPair.set(tradingPair, mapping);
      this.byInstId.set(instId, mapping);
    }
  }

  getTradingPairs(): string[] {
    return [...this.byPair.keys()];
  }

  getMappings(): InstrumentMapping[] {
    return [...this.byPair.values()];
  }

  toNative(tradingPair: string): string {
    const normalized = normalizeTradingPair(tradingPair);
    const mapping = normalized ? this.byPair.get(normalized) : undefined;
    if (mapping) {
      return mapping.instId;
    }
    const derived = normalized ? swapInstIdFromTradingPair(normalized) : null;
    if (!derived) {
      throw new UnknownSymbolError(tradingPair);
    }
    return derived;
  }

  toCanonical(instId: string): string {
    const mapping = this.byInstId.get(instId.trim().toUpperCase());
    if (mapping) {
      return mapping.tradingPair;
    }
    const derived = tradingPairFromSwapInstId(instId);
    if (!derived) {
      throw new UnknownSymbolError(instId);
    }
    return derived;
  }
}
