// ============================================================================
// @toonbench/core — Tokenizer Manager
// ============================================================================
//
// Local token counting for payload comparisons and dry runs. Each encoding
// gets its own js-tiktoken instance with a per-string LRU cache:
//   - cl100k_base  (GPT-4, GPT-3.5-Turbo)
//   - o200k_base   (GPT-4o, GPT-4o-mini, o-series)
//
// Counts are an estimate for non-OpenAI models; the benchmark driver always
// prefers the usage figures reported by the provider.
// ============================================================================

import { getEncoding } from 'js-tiktoken';
import type { TokenizerEncoding } from './types.js';

const DEFAULT_MAX_CACHE_SIZE = 10_000;

export interface CacheStats {
  size: number;
  maxSize: number;
  hits: number;
  misses: number;
  /** Percentage, one decimal */
  hitRatio: number;
}

/**
 * Bounded LRU cache. Evicts the least-recently-used entry when full.
 */
class LRUCache<K, V> {
  private map = new Map<K, V>();
  private readonly maxSize: number;
  private hits = 0;
  private misses = 0;

  constructor(maxSize: number) {
    this.maxSize = maxSize;
  }

  get(key: K): V | undefined {
    const value = this.map.get(key);
    if (value === undefined) {
      this.misses++;
      return undefined;
    }
    this.map.delete(key);
    this.map.set(key, value);
    this.hits++;
    return value;
  }

  set(key: K, value: V): void {
    if (this.map.has(key)) {
      this.map.delete(key);
    } else if (this.map.size >= this.maxSize) {
      const oldest = this.map.keys().next();
      if (!oldest.done) {
        this.map.delete(oldest.value);
      }
    }
    this.map.set(key, value);
  }

  getStats(): CacheStats {
    const total = this.hits + this.misses;
    return {
      size: this.map.size,
      maxSize: this.maxSize,
      hits: this.hits,
      misses: this.misses,
      hitRatio: total === 0 ? 0 : Math.round((this.hits / total) * 1000) / 10,
    };
  }

  clear(): void {
    this.map.clear();
    this.hits = 0;
    this.misses = 0;
  }
}

class TokenizerInstance {
  private readonly encoder: ReturnType<typeof getEncoding>;
  private readonly cache: LRUCache<string, number>;

  constructor(
    readonly encoding: TokenizerEncoding,
    maxCacheSize: number,
  ) {
    this.encoder = getEncoding(encoding);
    this.cache = new LRUCache(maxCacheSize);
  }

  tokenize(text: string): number[] {
    return Array.from(this.encoder.encode(text));
  }

  /** Count tokens (cached per string). */
  countTokens(text: string): number {
    const cached = this.cache.get(text);
    if (cached !== undefined) return cached;
    const count = this.encoder.encode(text).length;
    this.cache.set(text, count);
    return count;
  }

  getStats(): CacheStats {
    return this.cache.getStats();
  }

  clearCache(): void {
    this.cache.clear();
  }
}

/**
 * Multi-encoding tokenizer manager. Instances are created lazily.
 *
 * @example
 * ```ts
 * const tm = new TokenizerManager('o200k_base');
 * tm.countTokens('patient_id: P1');
 * tm.countTokens('patient_id: P1', 'cl100k_base');
 * tm.dispose();
 * ```
 */
export class TokenizerManager {
  private instances = new Map<TokenizerEncoding, TokenizerInstance>();
  private readonly maxCacheSize: number;

  constructor(
    readonly defaultEncoding: TokenizerEncoding = 'o200k_base',
    options?: { maxCacheSize?: number },
  ) {
    this.maxCacheSize = options?.maxCacheSize ?? DEFAULT_MAX_CACHE_SIZE;
  }

  private getInstance(encoding?: TokenizerEncoding): TokenizerInstance {
    const enc = encoding ?? this.defaultEncoding;
    let instance = this.instances.get(enc);
    if (!instance) {
      instance = new TokenizerInstance(enc, this.maxCacheSize);
      this.instances.set(enc, instance);
    }
    return instance;
  }

  tokenize(text: string, encoding?: TokenizerEncoding): number[] {
    return this.getInstance(encoding).tokenize(text);
  }

  countTokens(text: string, encoding?: TokenizerEncoding): number {
    return this.getInstance(encoding).countTokens(text);
  }

  /** Cache statistics per active encoding. */
  get stats(): Partial<Record<TokenizerEncoding, CacheStats>> {
    const result: Partial<Record<TokenizerEncoding, CacheStats>> = {};
    for (const [enc, instance] of this.instances) {
      result[enc] = instance.getStats();
    }
    return result;
  }

  dispose(): void {
    for (const instance of this.instances.values()) {
      instance.clearCache();
    }
    this.instances.clear();
  }
}

/**
 * Pick the tokenizer encoding for a model name. GPT-4o and the o-series use
 * o200k_base; older OpenAI models use cl100k_base. Other vendors fall back to
 * o200k_base as an approximation.
 */
export function resolveEncoding(model: string): TokenizerEncoding {
  const m = model.toLowerCase();
  if (/^gpt-4o|^gpt-4\.1|^gpt-5|^o\d/.test(m)) return 'o200k_base';
  if (/^gpt-4|^gpt-3\.5/.test(m)) return 'cl100k_base';
  return 'o200k_base';
}
