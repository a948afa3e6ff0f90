export { KeyedCache, SingleFlight } from './keyed-cache.js';
export type { CacheResult, Clock, KeyedCacheOptions } from './keyed-cache.js';
