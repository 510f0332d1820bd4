import axios from 'axios';
import type { AxiosInstance, AxiosResponse } from 'axios';
import { z } from 'zod';

import {
  ConfigurationError,
  EndpointUnavailableError,
  InvalidArgumentError,
  NetworkError,
  UpstreamError
} from '../errors';
import { type OrbitalObject, type RawRecord, parseOrbitalObject } from '../models/orbitalObject';
import { errorMessage, logDebug, logError, logWarn } from '../observability/logger';
import { type UpstreamOutcome, recordRateLimitRetry, recordUpstreamAttempt } from '../observability/metrics';
import { type Clock, systemClock } from './clock';
import { DEFAULT_REQUESTS_PER_SECOND, RateLimiter } from './rateLimiter';
import { type AttemptOutcome, RetryPolicy, type RetryState } from './retryPolicy';

export const DEFAULT_API_HOST = 'uphere-space1.p.rapidapi.com';
export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_ORBIT_PERIOD_MINUTES = 90;

export type Endpoint =
  | '/satellite/list'
  | '/satellite/list/countries'
  | '/satellite/list/launch-sites'
  | '/satellite/:id/orbit'
  | '/satellite/:id/details'
  | '/satellite/:id/location'
  | '/user/visible';

// 404 sur ces endpoints = abonnement insuffisant, pas absence de données.
const TIER_GATED = new Set<Endpoint>([
  '/satellite/:id/orbit',
  '/satellite/:id/details',
  '/satellite/:id/location'
]);

export interface UpHereClientOptions {
  apiKey?: string;
  apiHost?: string;
  /** Overrides `https://${apiHost}`. */
  baseUrl?: string;
  requestsPerSecond?: number;
  /** Deadline for a single attempt. */
  timeoutMs?: number;
  maxRetries?: number;
  backoffBaseMs?: number;
  clock?: Clock;
  http?: AxiosInstance;
}

export interface RequestOptions {
  signal?: AbortSignal;
  requestId?: string;
}

export interface SatelliteListFilters {
  text?: string;
  country?: string;
}

export interface Country {
  id?: number;
  name: string;
  abbreviation: string;
}

/** Launch sites come back as plain records keyed by their upstream field names. */
export type LaunchSite = RawRecord;

export interface OrbitPoint {
  lat: number;
  lng: number;
  date: string;
}

export type Units = 'metric' | 'imperial';

export interface LocationQuery {
  lat?: number;
  lng?: number;
  units?: Units;
}

export interface RequestStats {
  rateLimit: number;
  totalRequests: number;
  lastRequestAt: number | null;
  minRequestIntervalMs: number;
  timeUntilNextAllowedMs: number;
  canMakeRequestNow: boolean;
}

interface RequestRecord {
  lastRequestAt: number | null;
  totalRequests: number;
}

type QueryParams = Record<string, string | number>;

const countrySchema = z.object({
  id: z.number().int().optional(),
  name: z.string().trim().min(1),
  abbreviation: z.string().trim().min(1)
});

const orbitPointSchema = z.object({
  lat: z.number().finite(),
  lng: z.number().finite(),
  date: z.string()
});

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function bodyText(data: unknown): string {
  if (typeof data === 'string') {
    return data;
  }
  if (data === undefined || data === null) {
    return '';
  }
  try {
    return JSON.stringify(data);
  } catch {
    return String(data);
  }
}

function isTimeout(err: unknown): boolean {
  return axios.isAxiosError(err) && (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT');
}

function normalizeNoradId(noradId: string | number): string {
  const id = String(noradId).trim();
  if (!/^\d+$/.test(id)) {
    throw new InvalidArgumentError('noradId', `expected a numeric catalog number (got "${noradId}")`);
  }
  return id;
}

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidArgumentError(name, `must be a positive integer (got ${value})`);
  }
}

function assertCoordinate(name: 'lat' | 'lng', value: number): void {
  const limit = name === 'lat' ? 90 : 180;
  if (!Number.isFinite(value) || Math.abs(value) > limit) {
    throw new InvalidArgumentError(name, `must be between -${limit} and ${limit} (got ${value})`);
  }
}

/**
 * Client for the UpHere satellite catalog (RapidAPI).
 *
 * One instance owns its pacing and request accounting; several clients with
 * different ceilings can live in the same process.
 */
export class UpHereClient {
  readonly apiHost: string;
  private readonly apiKey: string | undefined;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly clock: Clock;
  private readonly http: AxiosInstance;
  private readonly limiter: RateLimiter;
  private readonly retry: RetryPolicy;
  private readonly record: RequestRecord = { lastRequestAt: null, totalRequests: 0 };

  constructor(options: UpHereClientOptions = {}) {
    this.apiKey = options.apiKey?.trim() || undefined;
    this.apiHost = options.apiHost?.trim() || DEFAULT_API_HOST;
    this.baseUrl = options.baseUrl ?? `https://${this.apiHost}`;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.clock = options.clock ?? systemClock;
    this.http = options.http ?? axios.create();
    this.limiter = new RateLimiter(options.requestsPerSecond ?? DEFAULT_REQUESTS_PER_SECOND, this.clock);
    this.retry = new RetryPolicy({
      limiter: this.limiter,
      clock: this.clock,
      maxRetries: options.maxRetries,
      backoffBaseMs: options.backoffBaseMs,
      onTransition: (state, endpoint) => this.onRetryTransition(state, endpoint)
    });
  }

  setRateLimit(requestsPerSecond: number): void {
    this.limiter.setRate(requestsPerSecond);
  }

  getRequestStats(): RequestStats {
    const timeUntilNextAllowedMs = this.limiter.timeUntilNextAllowed();
    return {
      rateLimit: this.limiter.rate,
      totalRequests: this.record.totalRequests,
      lastRequestAt: this.record.lastRequestAt,
      minRequestIntervalMs: this.limiter.minIntervalMs,
      timeUntilNextAllowedMs,
      canMakeRequestNow: timeUntilNextAllowedMs === 0
    };
  }

  async getSatelliteList(
    page: number,
    filters: SatelliteListFilters = {},
    options: RequestOptions = {}
  ): Promise<unknown[]> {
    assertPositiveInteger('page', page);
    const params: QueryParams = { page };
    const text = filters.text?.trim();
    const country = filters.country?.trim();
    if (text) {
      params.text = text;
    }
    if (country) {
      params.country = country;
    }

    const data = await this.request('/satellite/list', '/satellite/list', params, options);
    return this.expectArray('/satellite/list', data);
  }

  async getCountries(options: RequestOptions = {}): Promise<Country[]> {
    const endpoint = '/satellite/list/countries';
    const data = await this.request(endpoint, endpoint, undefined, options);
    const countries: Country[] = [];
    for (const entry of this.expectArray(endpoint, data)) {
      const parsed = countrySchema.safeParse(entry);
      if (parsed.success) {
        countries.push(parsed.data);
      } else {
        logWarn('uphere_country_skipped', { entry: bodyText(entry), requestId: options.requestId });
      }
    }
    return countries;
  }

  async getLaunchSites(options: RequestOptions = {}): Promise<LaunchSite[]> {
    const endpoint = '/satellite/list/launch-sites';
    const data = await this.request(endpoint, endpoint, undefined, options);
    return this.expectArray(endpoint, data).filter(isRecord);
  }

  async getSatelliteOrbit(
    noradId: string | number,
    periodMinutes: number = DEFAULT_ORBIT_PERIOD_MINUTES,
    options: RequestOptions = {}
  ): Promise<OrbitPoint[]> {
    const id = normalizeNoradId(noradId);
    assertPositiveInteger('periodMinutes', periodMinutes);
    const data = await this.request(
      '/satellite/:id/orbit',
      `/satellite/${id}/orbit`,
      { period: periodMinutes },
      options
    );
    const points: OrbitPoint[] = [];
    for (const entry of this.expectArray('/satellite/:id/orbit', data)) {
      const parsed = orbitPointSchema.safeParse(entry);
      if (parsed.success) {
        points.push(parsed.data);
      }
    }
    return points;
  }

  async getSatelliteDetails(noradId: string | number, options: RequestOptions = {}): Promise<RawRecord> {
    const id = normalizeNoradId(noradId);
    const data = await this.request('/satellite/:id/details', `/satellite/${id}/details`, undefined, options);
    return this.expectObject('/satellite/:id/details', data);
  }

  async getSatelliteLocation(
    noradId: string | number,
    query: LocationQuery = {},
    options: RequestOptions = {}
  ): Promise<RawRecord> {
    const id = normalizeNoradId(noradId);
    const params: QueryParams = { units: query.units ?? 'imperial' };
    if (query.lat !== undefined) {
      assertCoordinate('lat', query.lat);
      params.lat = query.lat;
    }
    if (query.lng !== undefined) {
      assertCoordinate('lng', query.lng);
      params.lng = query.lng;
    }
    const data = await this.request('/satellite/:id/location', `/satellite/${id}/location`, params, options);
    return this.expectObject('/satellite/:id/location', data);
  }

  async getVisibleSatellites(lat: number, lng: number, options: RequestOptions = {}): Promise<RawRecord[]> {
    assertCoordinate('lat', lat);
    assertCoordinate('lng', lng);
    const data = await this.request('/user/visible', '/user/visible', { lat, lng }, options);
    return this.expectArray('/user/visible', data).filter(isRecord);
  }

  /** Details endpoint parsed into the model; `null` when the record has no usable NORAD id. */
  async getSatelliteById(noradId: string | number, options: RequestOptions = {}): Promise<OrbitalObject | null> {
    const details = await this.getSatelliteDetails(noradId, options);
    const result = parseOrbitalObject(details);
    if (!result.ok) {
      logWarn('uphere_details_unparseable', {
        noradId: String(noradId),
        reason: result.error.reason,
        requestId: options.requestId
      });
      return null;
    }
    return result.object;
  }

  private requireApiKey(): string {
    if (!this.apiKey) {
      throw new ConfigurationError(
        'Missing UpHere API key. Set RAPIDAPI_KEY or pass apiKey to the client.',
        ['RAPIDAPI_KEY']
      );
    }
    return this.apiKey;
  }

  private async request(
    endpoint: Endpoint,
    path: string,
    params: QueryParams | undefined,
    options: RequestOptions
  ): Promise<unknown> {
    const apiKey = this.requireApiKey();
    const { signal, requestId } = options;

    return this.retry.execute(
      (attempt) => this.attempt(endpoint, path, params, apiKey, attempt, options),
      { endpoint, signal }
    ).catch((err: unknown) => {
      logError('uphere_request_failed', { endpoint, path, requestId, error: errorMessage(err) });
      throw err;
    });
  }

  private async attempt(
    endpoint: Endpoint,
    path: string,
    params: QueryParams | undefined,
    apiKey: string,
    attempt: number,
    options: RequestOptions
  ): Promise<AttemptOutcome<unknown>> {
    const started = this.clock.now();
    let response: AxiosResponse<unknown>;

    try {
      response = await this.http.request<unknown>({
        method: 'GET',
        baseURL: this.baseUrl,
        url: path,
        params,
        headers: {
          'x-rapidapi-key': apiKey,
          'x-rapidapi-host': this.apiHost,
          Accept: 'application/json'
        },
        timeout: this.timeoutMs,
        signal: options.signal,
        validateStatus: () => true
      });
    } catch (err: unknown) {
      this.recordAttempt(endpoint, 'network_error', started, attempt, options.requestId);
      if (options.signal?.aborted) {
        throw options.signal.reason;
      }
      throw new NetworkError(endpoint, isTimeout(err), err);
    }

    const { status } = response;

    if (status === 429) {
      this.recordAttempt(endpoint, 'rate_limited', started, attempt, options.requestId);
      return { kind: 'rate-limited' };
    }

    if (status >= 200 && status < 300) {
      this.recordAttempt(endpoint, 'ok', started, attempt, options.requestId);
      return { kind: 'ok', value: response.data };
    }

    if (status === 404 && TIER_GATED.has(endpoint)) {
      this.recordAttempt(endpoint, 'unavailable', started, attempt, options.requestId);
      throw new EndpointUnavailableError(endpoint);
    }

    this.recordAttempt(endpoint, 'http_error', started, attempt, options.requestId);
    throw new UpstreamError(endpoint, status, bodyText(response.data));
  }

  private recordAttempt(
    endpoint: Endpoint,
    outcome: UpstreamOutcome,
    started: number,
    attempt: number,
    requestId?: string
  ): void {
    const now = this.clock.now();
    this.record.totalRequests += 1;
    this.record.lastRequestAt = now;
    recordUpstreamAttempt(endpoint, outcome, now - started);
    logDebug('uphere_attempt', {
      endpoint,
      outcome,
      attempt,
      durationMs: now - started,
      totalRequests: this.record.totalRequests,
      requestId
    });
  }

  private onRetryTransition(state: RetryState, endpoint: string): void {
    if (state.kind === 'waiting') {
      recordRateLimitRetry(endpoint);
      logWarn('uphere_rate_limited', { endpoint, attempt: state.attempt, waitMs: state.waitMs });
    } else if (state.kind === 'exhausted') {
      logWarn('uphere_rate_limit_exhausted', {
        endpoint,
        attempts: state.attempts,
        totalWaitMs: state.totalWaitMs
      });
    }
  }

  private expectArray(endpoint: Endpoint, data: unknown): unknown[] {
    if (!Array.isArray(data)) {
      throw new UpstreamError(endpoint, 200, bodyText(data), `Expected a JSON array from ${endpoint}`);
    }
    return data;
  }

  private expectObject(endpoint: Endpoint, data: unknown): RawRecord {
    if (!isRecord(data)) {
      throw new UpstreamError(endpoint, 200, bodyText(data), `Expected a JSON object from ${endpoint}`);
    }
    return data;
  }
}
