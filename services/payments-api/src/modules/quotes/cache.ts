import { pairKey, type CurrencyPair } from '@fxdesk/domain';
import type { FxRate } from '@fxdesk/adapters';

export interface QuoteCacheOptions {
  /** Rates younger than this are served as fresh. */
  ttlMs: number;
  /** Rates older than this are evicted and never served, even degraded. */
  maxStaleMs: number;
  symbolTtlMs: number;
  clock?: () => number;
}

interface Entry<T> {
  value: T;
  storedAt: number;
}

export interface StaleEntry<T> {
  value: T;
  ageMs: number;
}

/**
 * In-process store of the latest rate per pair and of the upstream symbol
 * list. Writes are last-writer-wins; there is no capacity bound since the
 * key space is the registry's pairs.
 */
export class QuoteCache {
  private readonly rates = new Map<string, Entry<FxRate>>();
  private symbols: Entry<Record<string, string>> | undefined;
  private readonly clock: () => number;

  constructor(private readonly options: QuoteCacheOptions) {
    this.clock = options.clock ?? Date.now;
  }

  get(pair: CurrencyPair): FxRate | undefined {
    const entry = this.rates.get(pairKey(pair));
    if (!entry || this.age(entry) >= this.options.ttlMs) {
      return undefined;
    }
    return entry.value;
  }

  peek(pair: CurrencyPair): StaleEntry<FxRate> | undefined {
    const key = pairKey(pair);
    const entry = this.rates.get(key);
    if (!entry) {
      return undefined;
    }

    const ageMs = this.age(entry);
    if (ageMs > this.options.maxStaleMs) {
      this.rates.delete(key);
      return undefined;
    }
    return { value: entry.value, ageMs };
  }

  put(pair: CurrencyPair, rate: FxRate): void {
    this.rates.set(pairKey(pair), { value: rate, storedAt: this.clock() });
  }

  getSymbols(): Record<string, string> | undefined {
    if (!this.symbols || this.age(this.symbols) >= this.options.symbolTtlMs) {
      return undefined;
    }
    return this.symbols.value;
  }

  /** The last symbol list however old; symbol sets change rarely enough to keep. */
  peekSymbols(): StaleEntry<Record<string, string>> | undefined {
    if (!this.symbols) {
      return undefined;
    }
    return { value: this.symbols.value, ageMs: this.age(this.symbols) };
  }

  putSymbols(symbols: Record<string, string>): void {
    this.symbols = { value: symbols, storedAt: this.clock() };
  }

  clear(): void {
    this.rates.clear();
    this.symbols = undefined;
  }

  private age(entry: Entry<unknown>): number {
    return Math.max(0, this.clock() - entry.storedAt);
  }
}
