/**
 * Shared Key/Value Backing Store
 *
 * The single source of truth for cache entries, rate-limit buckets and job queues:
 * 1. Redis when REDIS_URL is configured (shared across worker processes)
 * 2. In-memory Map otherwise (single process, local development and tests)
 *
 * A configured Redis that cannot be reached is an error; the store never
 * degrades to memory behind the caller's back.
 */

import { createClient } from 'redis';
import { StoreUnavailableError, toError } from '../infra/errors.js';

/**
 * Operations the cache, rate limiter and job queues need from the backing service
 */
export interface KeyValueStore {
  get(key: string): Promise<string | null>;
  /** Unconditional write; ttlMs omitted means no expiry */
  set(key: string, value: string, ttlMs?: number): Promise<void>;
  /**
   * Atomically replace the value at key when it currently equals `expected`
   * (null: key must be absent). Returns whether the write happened.
   */
  compareAndSet(key: string, expected: string | null, next: string, ttlMs?: number): Promise<boolean>;
  del(...keys: string[]): Promise<number>;
  /** Keys matching a Redis-style glob pattern (see globToRegExp) */
  keys(pattern: string): Promise<string[]>;
  /** Push onto the head of a list; returns the new length */
  listPush(key: string, value: string): Promise<number>;
  /** Atomically move the tail element of source onto the head of destination */
  listMove(source: string, destination: string): Promise<string | null>;
  /** Remove up to `count` elements equal to value, head first (0 removes all) */
  listRemove(key: string, value: string, count?: number): Promise<number>;
  listLength(key: string): Promise<number>;
  /** Elements start..stop inclusive; negative indices count from the tail */
  listRange(key: string, start: number, stop: number): Promise<string[]>;
  ping(): Promise<boolean>;
  close(): Promise<void>;
}

interface MemoryEntry {
  value: string;
  expires: number | null; // null = no expiration
}

const GLOB_SPECIAL = /[*?[\]\\]/g;

/**
 * Backslash-escape Redis glob metacharacters so a value matches only itself
 *
 * @example
 * escapeGlob('w*') // 'w\\*'
 */
export function escapeGlob(value: string): string {
  return value.replace(GLOB_SPECIAL, '\\$&');
}

const escapeRegExpChar = (char: string): string => char.replace(/[-.*+?^${}()|[\]\\/]/g, '\\$&');

/**
 * Parse a [...] class starting after '['. Returns null when it is unterminated.
 */
function readCharClass(pattern: string, start: number): { source: string; end: number } | null {
  let i = start;
  let negate = false;
  if (pattern[i] === '^') {
    negate = true;
    i++;
  }

  const items: string[] = [];
  while (i < pattern.length && pattern[i] !== ']') {
    const char = pattern[i];
    if (char === '\\' && i + 1 < pattern.length) {
      items.push(escapeRegExpChar(pattern[i + 1]));
      i += 2;
    } else if (pattern[i + 1] === '-' && i + 2 < pattern.length && pattern[i + 2] !== ']') {
      const [low, high] = char <= pattern[i + 2] ? [char, pattern[i + 2]] : [pattern[i + 2], char];
      items.push(`${escapeRegExpChar(low)}-${escapeRegExpChar(high)}`);
      i += 3;
    } else {
      items.push(escapeRegExpChar(char));
      i++;
    }
  }
  if (i >= pattern.length) return null;

  if (items.length === 0) {
    // '[]' matches nothing, '[^]' any single character
    return { source: negate ? '[\\s\\S]' : '(?!)', end: i };
  }
  return { source: `[${negate ? '^' : ''}${items.join('')}]`, end: i };
}

/**
 * Convert a Redis-style glob into an anchored RegExp
 *
 * Supports `*`, `?`, `[abc]`, `[^abc]`, `[a-z]` and backslash escapes, as
 * SCAN MATCH does. An unterminated '[' matches itself.
 */
export function globToRegExp(pattern: string): RegExp {
  let source = '';
  for (let i = 0; i < pattern.length; i++) {
    const char = pattern[i];
    if (char === '*') {
      source += '[\\s\\S]*';
    } else if (char === '?') {
      source += '[\\s\\S]';
    } else if (char === '\\' && i + 1 < pattern.length) {
      i++;
      source += escapeRegExpChar(pattern[i]);
    } else if (char === '[') {
      const charClass = readCharClass(pattern, i + 1);
      if (charClass) {
        source += charClass.source;
        i = charClass.end;
      } else {
        source += escapeRegExpChar(char);
      }
    } else {
      source += escapeRegExpChar(char);
    }
  }
  return new RegExp(`^${source}$`);
}

/**
 * In-Memory Store Implementation
 *
 * compareAndSet is atomic because each call completes synchronously on the
 * event loop before any other caller runs.
 */
export class MemoryStore implements KeyValueStore {
  private store: Map<string, MemoryEntry> = new Map();
  private lists: Map<string, string[]> = new Map();
  private cleanupInterval: NodeJS.Timeout | null = null;

  constructor(cleanupIntervalMs: number = 60_000) {
    this.cleanupInterval = setInterval(() => this.cleanup(), cleanupIntervalMs);
    this.cleanupInterval.unref();
  }

  private cleanup(): void {
    const now = Date.now();
    for (const [key, entry] of this.store) {
      if (entry.expires !== null && entry.expires <= now) {
        this.store.delete(key);
      }
    }
  }

  private read(key: string): string | null {
    const entry = this.store.get(key);
    if (!entry) return null;

    if (entry.expires !== null && entry.expires <= Date.now()) {
      this.store.delete(key);
      return null;
    }

    return entry.value;
  }

  private write(key: string, value: string, ttlMs?: number): void {
    const expires = ttlMs !== undefined && ttlMs > 0 ? Date.now() + ttlMs : null;
    this.store.set(key, { value, expires });
  }

  async get(key: string): Promise<string | null> {
    return this.read(key);
  }

  async set(key: string, value: string, ttlMs?: number): Promise<void> {
    this.write(key, value, ttlMs);
  }

  async compareAndSet(key: string, expected: string | null, next: string, ttlMs?: number): Promise<boolean> {
    if (this.read(key) !== expected) {
      return false;
    }
    this.write(key, next, ttlMs);
    return true;
  }

  async del(...keys: string[]): Promise<number> {
    let removed = 0;
    for (const key of keys) {
      const hadValue = this.read(key) !== null;
      const hadList = this.lists.delete(key);
      this.store.delete(key);
      if (hadValue || hadList) removed++;
    }
    return removed;
  }

  async keys(pattern: string): Promise<string[]> {
    const regex = globToRegExp(pattern);
    const live = Array.from(this.store.keys()).filter(k => this.read(k) !== null);
    return [...live, ...this.lists.keys()].filter(k => regex.test(k));
  }

  async listPush(key: string, value: string): Promise<number> {
    const list = this.lists.get(key) ?? [];
    list.unshift(value);
    this.lists.set(key, list);
    return list.length;
  }

  async listMove(source: string, destination: string): Promise<string | null> {
    const from = this.lists.get(source);
    const value = from?.pop();
    if (!from || value === undefined) return null;
    // Empty lists do not exist, as in Redis
    if (from.length === 0) this.lists.delete(source);

    const to = this.lists.get(destination) ?? [];
    to.unshift(value);
    this.lists.set(destination, to);
    return value;
  }

  async listRemove(key: string, value: string, count: number = 1): Promise<number> {
    const list = this.lists.get(key);
    if (!list) return 0;

    let removed = 0;
    const kept = list.filter(item => {
      if (item === value && (count === 0 || removed < Math.abs(count))) {
        removed++;
        return false;
      }
      return true;
    });
    if (kept.length === 0) this.lists.delete(key);
    else this.lists.set(key, kept);
    return removed;
  }

  async listLength(key: string): Promise<number> {
    return this.lists.get(key)?.length ?? 0;
  }

  async listRange(key: string, start: number, stop: number): Promise<string[]> {
    const list = this.lists.get(key) ?? [];
    const from = Math.max(0, start < 0 ? list.length + start : start);
    const to = stop < 0 ? list.length + stop : Math.min(stop, list.length - 1);
    return from > to ? [] : list.slice(from, to + 1);
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
    this.store.clear();
    this.lists.clear();
  }

  /** Number of live keys, lists included */
  size(): number {
    this.cleanup();
    return this.store.size + this.lists.size;
  }
}

/**
 * Compare-and-set as a single server-side step.
 * ARGV: expected, hasExpected ('1'/'0'), next, ttlMs ('0' = no expiry)
 */
const COMPARE_AND_SET_SCRIPT = `
local current = redis.call('GET', KEYS[1])
if ARGV[2] == '1' then
  if current ~= ARGV[1] then return 0 end
else
  if current then return 0 end
end
local ttl = tonumber(ARGV[4])
if ttl > 0 then
  redis.call('SET', KEYS[1], ARGV[3], 'PX', ttl)
else
  redis.call('SET', KEYS[1], ARGV[3])
end
return 1
`;

export type RedisClient = ReturnType<typeof createClient>;

/**
 * Redis Store Implementation
 */
export class RedisStore implements KeyValueStore {
  private client: RedisClient;

  constructor(client: RedisClient) {
    this.client = client;
  }

  private async run<T>(command: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      const err = toError(error);
      console.error(`[Store] Redis ${command} failed: ${err.message}`);
      throw new StoreUnavailableError(`Redis ${command} failed: ${err.message}`, err);
    }
  }

  async get(key: string): Promise<string | null> {
    return this.run('GET', () => this.client.get(key));
  }

  async set(key: string, value: string, ttlMs?: number): Promise<void> {
    await this.run('SET', () =>
      ttlMs !== undefined && ttlMs > 0
        ? this.client.set(key, value, { PX: Math.ceil(ttlMs) })
        : this.client.set(key, value)
    );
  }

  async compareAndSet(key: string, expected: string | null, next: string, ttlMs?: number): Promise<boolean> {
    const reply = await this.run('EVAL', () =>
      this.client.eval(COMPARE_AND_SET_SCRIPT, {
        keys: [key],
        arguments: [
          expected ?? '',
          expected === null ? '0' : '1',
          next,
          String(ttlMs !== undefined && ttlMs > 0 ? Math.ceil(ttlMs) : 0),
        ],
      })
    );
    return reply === 1;
  }

  async del(...keys: string[]): Promise<number> {
    if (keys.length === 0) return 0;
    return this.run('DEL', () => this.client.del(keys));
  }

  async keys(pattern: string): Promise<string[]> {
    return this.run('SCAN', async () => {
      const found: string[] = [];
      for await (const key of this.client.scanIterator({ MATCH: pattern, COUNT: 100 })) {
        found.push(key);
      }
      return found;
    });
  }

  async listPush(key: string, value: string): Promise<number> {
    return this.run('LPUSH', () => this.client.lPush(key, value));
  }

  async listMove(source: string, destination: string): Promise<string | null> {
    return this.run('RPOPLPUSH', () => this.client.rPopLPush(source, destination));
  }

  async listRemove(key: string, value: string, count: number = 1): Promise<number> {
    return this.run('LREM', () => this.client.lRem(key, count, value));
  }

  async listLength(key: string): Promise<number> {
    return this.run('LLEN', () => this.client.lLen(key));
  }

  async listRange(key: string, start: number, stop: number): Promise<string[]> {
    return this.run('LRANGE', () => this.client.lRange(key, start, stop));
  }

  async ping(): Promise<boolean> {
    const reply = await this.run('PING', () => this.client.ping());
    return reply === 'PONG';
  }

  async close(): Promise<void> {
    if (this.client.isOpen) {
      await this.client.quit();
    }
  }
}

/**
 * Connect to Redis. Connection failures surface as StoreUnavailableError.
 */
export async function connectRedisStore(url: string, connectTimeoutMs: number = 5000): Promise<RedisStore> {
  const client = createClient({
    url,
    disableOfflineQueue: true,
    socket: {
      connectTimeout: connectTimeoutMs,
      reconnectStrategy: retries => Math.min(retries * 200, 5000),
    },
  });

  client.on('error', (err: Error) => {
    console.error('[Store] Redis error:', err.message);
  });

  try {
    await client.connect();
  } catch (error) {
    const err = toError(error);
    throw new StoreUnavailableError(`Redis connection failed: ${err.message}`, err);
  }

  console.log('[Store] Connected to Redis');
  return new RedisStore(client);
}

/**
 * Pick the backing store: Redis when a URL is configured, memory otherwise
 */
export async function connectStore(redisUrl: string | null): Promise<KeyValueStore> {
  if (redisUrl) {
    return connectRedisStore(redisUrl);
  }
  console.log('[Store] Using in-memory store (no REDIS_URL configured, single process only)');
  return new MemoryStore();
}

export interface StoreHealth {
  status: 'healthy' | 'unhealthy';
  latencyMs?: number;
  error?: string;
}

/**
 * Ping the backing store and report its health
 */
export async function storeHealth(store: KeyValueStore): Promise<StoreHealth> {
  const started = Date.now();
  try {
    const ok = await store.ping();
    if (!ok) {
      return { status: 'unhealthy', error: 'Unexpected PING reply' };
    }
    return { status: 'healthy', latencyMs: Date.now() - started };
  } catch (error) {
    return { status: 'unhealthy', error: toError(error).message };
  }
}
