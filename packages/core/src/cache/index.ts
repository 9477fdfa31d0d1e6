export { MemoryTtlCache, getOrLoad } from './ttl-cache';
export type { Cache, Clock } from './ttl-cache';
