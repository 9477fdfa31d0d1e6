export * from './observability';
export * from './cache';
export * from './locks';
export { loadConfig, envSchema } from './config';
export type { AppConfig, Env } from './config';
