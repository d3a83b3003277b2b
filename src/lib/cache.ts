import NodeCache from "node-cache";

export interface CacheOptions {
  ttl?: number; // segundos
}

/** Chaves usadas pelo serviço de relatório */
export const CACHE_KEYS = {
  tables: "finance:tables",
} as const;

/**
 * Cache em memória das tabelas já validadas.
 * Injetado no serviço de relatório; os motores de cálculo não o conhecem.
 */
export class TableCache {
  private readonly cache: NodeCache;
  private readonly defaultTtl: number;

  constructor(ttlSeconds = 300) {
    this.defaultTtl = ttlSeconds;
    this.cache = new NodeCache({
      stdTTL: ttlSeconds,
      checkperiod: 60,
      useClones: false, // tabelas são tratadas como imutáveis
    });
  }

  /**
   * Obtém valor do cache ou executa o loader e armazena o resultado.
   * Erros do loader não são cacheados.
   */
  async getOrLoad<T>(key: string, loader: () => Promise<T>, options?: CacheOptions): Promise<T> {
    const cached = this.cache.get<T>(key);
    if (cached !== undefined) return cached;

    const value = await loader();
    this.cache.set(key, value, options?.ttl ?? this.defaultTtl);
    return value;
  }

  get<T>(key: string): T | undefined {
    return this.cache.get<T>(key);
  }

  set<T>(key: string, value: T, ttl?: number): boolean {
    return this.cache.set(key, value, ttl ?? this.defaultTtl);
  }

  invalidate(key: string): number {
    return this.cache.del(key);
  }

  /** Remove todas as chaves que começam com o prefixo */
  invalidatePrefix(prefix: string): number {
    const keys = this.cache.keys().filter((key) => key.startsWith(prefix));
    return keys.reduce((count, key) => count + this.cache.del(key), 0);
  }

  flush(): void {
    this.cache.flushAll();
  }

  keys(): string[] {
    return this.cache.keys();
  }

  // encerra o timer de checkperiod
  close(): void {
    this.cache.close();
  }
}
