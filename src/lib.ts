export * from './errors';
export { systemClock } from './uphere/clock';
export type { Clock } from './uphere/clock';
export { RateLimiter, DEFAULT_REQUESTS_PER_SECOND } from './uphere/rateLimiter';
export { RetryPolicy, DEFAULT_BACKOFF_BASE_MS, DEFAULT_MAX_RETRIES } from './uphere/retryPolicy';
export type { AttemptOutcome, RetryEvent, RetryState } from './uphere/retryPolicy';
export { UpHereClient, DEFAULT_API_HOST } from './uphere/upHereClient';
export type {
  UpHereClientOptions,
  Country,
  LaunchSite,
  OrbitPoint,
  RequestOptions,
  RequestStats
} from './uphere/upHereClient';
export {
  parseOrbitalObject,
  parseOrbitalObjects,
  describeOrbitalObject,
  hasPosition
} from './models/orbitalObject';
export type { OrbitalObject, ObjectType, GeoPosition, ParsedBatch } from './models/orbitalObject';
export { SatelliteService } from './services/satelliteService';
export type {
  SatelliteServiceOptions,
  SatellitePage,
  NoradLookup,
  CacheStats
} from './services/satelliteService';
export { loadConfig } from './config/env';
export { setLogLevel } from './observability/logger';
export type { LogThreshold } from './observability/logger';
export type { AppConfig } from './config/env';
export { createApp } from './app';
