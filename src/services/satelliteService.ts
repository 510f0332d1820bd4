import { InvalidArgumentError, type NotFound, type ParseError } from '../errors';
import { type OrbitalObject, type ParsedBatch, parseOrbitalObjects } from '../models/orbitalObject';
import { errorMessage, logError, logInfo, logWarn } from '../observability/logger';
import { recordCacheLookup } from '../observability/metrics';
import { type Clock, systemClock } from '../uphere/clock';
import type { Country, UpHereClient } from '../uphere/upHereClient';

/** 0 keeps entries for the lifetime of the service. */
export const DEFAULT_CACHE_TTL_MS = 0;
export const DEFAULT_MAX_SEARCH_PAGES = 10;
export const DEFAULT_MAX_NAME_RESULTS = 10;

export type CacheStatus = 'HIT' | 'MISS';
export type CacheKeyState = 'absent' | 'fetching' | 'cached';

export interface SatellitePage {
  page: number;
  country?: string;
  satellites: readonly OrbitalObject[];
  parseFailures: readonly ParseError[];
  cacheStatus: CacheStatus;
  fetchedAt: number;
  cacheAgeMs: number;
}

export type NoradLookup = { status: 'found'; satellite: OrbitalObject; page: number } | NotFound;

export interface SatelliteServiceOptions {
  cacheTtlMs?: number;
  /** Upper bound on pages fetched by name/NORAD scans. */
  maxSearchPages?: number;
  clock?: Clock;
}

export interface LookupOptions {
  signal?: AbortSignal;
  requestId?: string;
  /** Skip a cached entry and fetch again; the new result replaces it. */
  forceRefresh?: boolean;
}

export interface NameSearchOptions extends LookupOptions {
  maxResults?: number;
}

export interface CacheStats {
  entries: number;
  inflight: number;
  keys: string[];
  ttlMs: number;
  maxSearchPages: number;
}

interface ListQuery {
  page: number;
  country?: string;
}

interface ListValue {
  query: ListQuery;
  batch: ParsedBatch;
}

interface CacheEntry<T> {
  value: T;
  fetchedAt: number;
  expiresAt: number | null;
}

interface CacheStore<T> {
  kind: string;
  entries: Map<string, CacheEntry<T>>;
  inflight: Map<string, Promise<CacheEntry<T>>>;
  /** Bumped by clearCache(); fetches started under an older generation do not store. */
  generation: number;
}

function createStore<T>(kind: string): CacheStore<T> {
  return { kind, entries: new Map(), inflight: new Map(), generation: 0 };
}

function resetStore<T>(store: CacheStore<T>): void {
  store.entries.clear();
  store.inflight.clear();
  store.generation += 1;
}

function listKey(query: ListQuery): string {
  return query.country ? `list:page=${query.page}:country=${query.country}` : `list:page=${query.page}`;
}

function assertPage(page: number): void {
  if (!Number.isInteger(page) || page < 1) {
    throw new InvalidArgumentError('page', `must be a positive integer (got ${page})`);
  }
}

/**
 * Lets one caller stop waiting without cancelling a fetch other callers share.
 */
function detach<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    void promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      }
    );
  });
}

/**
 * Read-through cache over the UpHere client.
 *
 * Each key goes absent → fetching → cached. Concurrent lookups of a key share
 * one in-flight fetch; a failed fetch is forwarded to every waiting caller and
 * leaves the key absent.
 */
export class SatelliteService {
  readonly cacheTtlMs: number;
  readonly maxSearchPages: number;
  private readonly clock: Clock;
  private readonly lists = createStore<ListValue>('satellite_list');
  private readonly countries = createStore<readonly Country[]>('countries');

  constructor(
    readonly client: UpHereClient,
    options: SatelliteServiceOptions = {}
  ) {
    this.cacheTtlMs = Math.max(0, options.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS);
    this.maxSearchPages = options.maxSearchPages ?? DEFAULT_MAX_SEARCH_PAGES;
    if (!Number.isInteger(this.maxSearchPages) || this.maxSearchPages < 1) {
      throw new InvalidArgumentError('maxSearchPages', `must be a positive integer (got ${this.maxSearchPages})`);
    }
    this.clock = options.clock ?? systemClock;
  }

  async getSatellites(page = 1, options: LookupOptions = {}): Promise<SatellitePage> {
    assertPage(page);
    return this.loadList({ page }, options);
  }

  /** Filtered upstream, not by scanning cached pages. */
  async getSatellitesByCountry(
    countryCode: string,
    page = 1,
    options: LookupOptions = {}
  ): Promise<SatellitePage> {
    const country = countryCode.trim().toUpperCase();
    if (!country) {
      throw new InvalidArgumentError('countryCode', 'must not be empty');
    }
    assertPage(page);
    return this.loadList({ page, country }, options);
  }

  async findSatelliteByName(fragment: string, options: NameSearchOptions = {}): Promise<OrbitalObject[]> {
    const needle = fragment.trim().toLowerCase();
    if (!needle) {
      throw new InvalidArgumentError('name', 'search fragment must not be empty');
    }
    const maxResults = options.maxResults ?? DEFAULT_MAX_NAME_RESULTS;
    if (!Number.isInteger(maxResults) || maxResults < 1) {
      throw new InvalidArgumentError('maxResults', `must be a positive integer (got ${maxResults})`);
    }

    const matches: OrbitalObject[] = [];
    const seen = new Set<string>();

    await this.scanPages((satellites) => {
      for (const satellite of satellites) {
        if (seen.has(satellite.noradId) || !satellite.name.toLowerCase().includes(needle)) {
          continue;
        }
        seen.add(satellite.noradId);
        matches.push(satellite);
        if (matches.length >= maxResults) {
          return true;
        }
      }
      return false;
    }, options);

    return matches;
  }

  async findSatelliteByNoradId(noradId: string | number, options: LookupOptions = {}): Promise<NoradLookup> {
    const id = String(noradId).trim();
    if (!id) {
      throw new InvalidArgumentError('noradId', 'must not be empty');
    }

    const hit: { satellite?: OrbitalObject; page?: number } = {};
    const pagesScanned = await this.scanPages((satellites, page) => {
      const satellite = satellites.find((candidate) => candidate.noradId === id);
      if (satellite) {
        hit.satellite = satellite;
        hit.page = page;
        return true;
      }
      return false;
    }, options);

    if (hit.satellite && hit.page !== undefined) {
      return { status: 'found', satellite: hit.satellite, page: hit.page };
    }
    logInfo('satellite_norad_not_found', { noradId: id, pagesScanned, requestId: options.requestId });
    return { status: 'not-found', pagesScanned };
  }

  async getCountries(options: LookupOptions = {}): Promise<readonly Country[]> {
    const { entry } = await this.readThrough(
      this.countries,
      'countries',
      async () => Object.freeze(await this.client.getCountries({ requestId: options.requestId })),
      options
    );
    return entry.value;
  }

  getPageState(page: number, countryCode?: string): CacheKeyState {
    const country = countryCode?.trim().toUpperCase() || undefined;
    const key = listKey({ page, country });
    if (this.freshEntry(this.lists, key)) {
      return 'cached';
    }
    return this.lists.inflight.has(key) ? 'fetching' : 'absent';
  }

  clearCache(): void {
    resetStore(this.lists);
    resetStore(this.countries);
    logInfo('satellite_cache_cleared');
  }

  getCacheStats(): CacheStats {
    const keys = [...this.lists.entries.keys(), ...this.countries.entries.keys()];
    return {
      entries: keys.length,
      inflight: this.lists.inflight.size + this.countries.inflight.size,
      keys,
      ttlMs: this.cacheTtlMs,
      maxSearchPages: this.maxSearchPages
    };
  }

  private async loadList(query: ListQuery, options: LookupOptions): Promise<SatellitePage> {
    const { entry, status } = await this.readThrough(
      this.lists,
      listKey(query),
      async () => {
        const records = await this.client.getSatelliteList(
          query.page,
          { country: query.country },
          { requestId: options.requestId }
        );
        const batch = parseOrbitalObjects(records);
        if (batch.failures.length > 0) {
          logWarn('satellite_records_rejected', {
            page: query.page,
            country: query.country,
            rejected: batch.failures.length,
            reasons: batch.failures.map((failure) => failure.message),
            requestId: options.requestId
          });
        }
        return { query, batch };
      },
      options
    );

    return {
      page: query.page,
      ...(query.country ? { country: query.country } : {}),
      satellites: entry.value.batch.objects,
      parseFailures: entry.value.batch.failures,
      cacheStatus: status,
      fetchedAt: entry.fetchedAt,
      cacheAgeMs: Math.max(0, this.clock.now() - entry.fetchedAt)
    };
  }

  /**
   * Visits cached unfiltered pages first, then walks pages 1..maxSearchPages,
   * fetching the ones not cached, until `visit` returns true or a page comes
   * back empty. Returns how many distinct pages were examined.
   */
  private async scanPages(
    visit: (satellites: readonly OrbitalObject[], page: number) => boolean,
    options: LookupOptions
  ): Promise<number> {
    const examined = new Set<number>();

    for (const { query, batch } of this.cachedPages()) {
      examined.add(query.page);
      if (visit(batch.objects, query.page)) {
        return examined.size;
      }
    }

    for (let page = 1; page <= this.maxSearchPages; page++) {
      const result = await this.getSatellites(page, { signal: options.signal, requestId: options.requestId });
      const alreadyVisited = examined.has(page);
      examined.add(page);
      // Page vide = fin du catalogue.
      if (result.satellites.length === 0 && result.parseFailures.length === 0) {
        break;
      }
      if (!alreadyVisited && visit(result.satellites, page)) {
        break;
      }
    }

    return examined.size;
  }

  private cachedPages(): ListValue[] {
    const pages: ListValue[] = [];
    for (const key of [...this.lists.entries.keys()]) {
      const entry = this.freshEntry(this.lists, key);
      if (entry && !entry.value.query.country) {
        pages.push(entry.value);
      }
    }
    return pages.sort((a, b) => a.query.page - b.query.page);
  }

  private freshEntry<T>(store: CacheStore<T>, key: string): CacheEntry<T> | null {
    const entry = store.entries.get(key);
    if (!entry) {
      return null;
    }
    if (entry.expiresAt !== null && this.clock.now() >= entry.expiresAt) {
      store.entries.delete(key);
      return null;
    }
    return entry;
  }

  private async readThrough<T>(
    store: CacheStore<T>,
    key: string,
    load: () => Promise<T>,
    options: LookupOptions
  ): Promise<{ entry: CacheEntry<T>; status: CacheStatus }> {
    options.signal?.throwIfAborted();

    const cached = options.forceRefresh ? null : this.freshEntry(store, key);
    if (cached) {
      recordCacheLookup(store.kind, 'hit');
      return { entry: cached, status: 'HIT' };
    }

    let pending = store.inflight.get(key);
    if (pending) {
      recordCacheLookup(store.kind, 'joined');
    } else {
      recordCacheLookup(store.kind, 'miss');
      const generation = store.generation;
      const fetching: Promise<CacheEntry<T>> = load()
        .then((value) => {
          const now = this.clock.now();
          const entry: CacheEntry<T> = {
            value,
            fetchedAt: now,
            expiresAt: this.cacheTtlMs > 0 ? now + this.cacheTtlMs : null
          };
          if (store.generation === generation) {
            store.entries.set(key, entry);
            logInfo('satellite_cache_store', { key, requestId: options.requestId });
          }
          return entry;
        })
        .catch((err: unknown) => {
          logError('satellite_cache_fetch_failed', {
            key,
            requestId: options.requestId,
            error: errorMessage(err)
          });
          throw err;
        })
        .finally(() => {
          if (store.inflight.get(key) === fetching) {
            store.inflight.delete(key);
          }
        });
      store.inflight.set(key, fetching);
      pending = fetching;
    }

    const entry = await detach(pending, options.signal);
    return { entry, status: 'MISS' };
  }
}
