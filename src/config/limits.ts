/**
 * Static quotas and cache lifetimes
 */

export interface BucketConfig {
  /** Maximum tokens the bucket holds */
  capacity: number;
  /** Tokens added per second */
  refillPerSecond: number;
}

/**
 * Default rate limits per external resource
 */
export const DEFAULT_RATE_LIMITS: Record<string, BucketConfig> = {
  garmin_api: { capacity: 15, refillPerSecond: 15 / 60 },    // 15/min
  weather_api: { capacity: 60, refillPerSecond: 1 },         // 60/min
  github_api: { capacity: 30, refillPerSecond: 0.5 },        // 30/min
  'provider:anthropic': { capacity: 50, refillPerSecond: 50 / 60 },
  'provider:openai': { capacity: 60, refillPerSecond: 1 },
};

/**
 * Cache namespaces for the external data the workers read
 */
export const CacheNamespaces = {
  WEATHER: 'weather',
  CALENDAR: 'calendar',
  GITHUB: 'github',
  GARMIN_HEALTH: 'garmin:health',
  GARMIN_ACTIVITIES: 'garmin:activities',
} as const;

/**
 * Shared job queues
 */
export const QueueNames = {
  SYNC_TASKS: 'sync_tasks',
  NOTIFICATIONS: 'notifications',
} as const;

/**
 * Default TTL values in milliseconds
 */
export const DEFAULT_CACHE_TTLS: Record<string, number> = {
  [CacheNamespaces.WEATHER]: 30 * 60_000,         // 30 minutes
  [CacheNamespaces.CALENDAR]: 5 * 60_000,         // 5 minutes
  [CacheNamespaces.GITHUB]: 15 * 60_000,          // 15 minutes
  [CacheNamespaces.GARMIN_HEALTH]: 60 * 60_000,   // 1 hour
  [CacheNamespaces.GARMIN_ACTIVITIES]: 60 * 60_000,
};

/**
 * TTL for namespaces without an explicit entry
 */
export const FALLBACK_CACHE_TTL_MS = 5 * 60_000;
