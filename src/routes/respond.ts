import type { Request, Response } from 'express';

import { InvalidArgumentError, RateLimitExhaustedError, httpStatusFor, isOrbitCatalogError } from '../errors';
import type { OrbitalObject } from '../models/orbitalObject';
import { errorMessage, logError, logWarn } from '../observability/logger';
import type { SatellitePage } from '../services/satelliteService';

export function parseForceRefresh(req: Request): boolean {
  const refreshParam = queryValue(req, 'refresh');
  const refreshHeaderRaw = req.headers['x-refresh-cache'];
  const refreshHeader = Array.isArray(refreshHeaderRaw) ? refreshHeaderRaw[0] : refreshHeaderRaw;

  return (
    refreshParam === '1' ||
    refreshParam === 'true' ||
    refreshHeader === '1' ||
    refreshHeader === 'true'
  );
}

function queryValue(req: Request, name: string): string | undefined {
  const value = req.query?.[name];
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value) && typeof value[0] === 'string') {
    return value[0];
  }
  return undefined;
}

export function queryString(req: Request, name: string): string | undefined {
  const value = queryValue(req, name)?.trim();
  return value ? value : undefined;
}

export function queryInteger(req: Request, name: string, fallback: number): number {
  const raw = queryString(req, name);
  if (raw === undefined) {
    return fallback;
  }
  if (!/^\d+$/.test(raw)) {
    throw new InvalidArgumentError(name, `expected a positive integer (got "${raw}")`);
  }
  return Number(raw);
}

export function queryNumber(req: Request, name: string): number | undefined {
  const raw = queryString(req, name);
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new InvalidArgumentError(name, `expected a number (got "${raw}")`);
  }
  return value;
}

export function serializeSatellite(satellite: OrbitalObject): Record<string, unknown> {
  return {
    noradId: satellite.noradId,
    name: satellite.name,
    objectType: satellite.objectType,
    launchDate: satellite.launchDate?.toISOString(),
    country: satellite.country,
    position: satellite.position
  };
}

export function sendPage(res: Response, page: SatellitePage): void {
  res.setHeader('X-Satellite-Cache', page.cacheStatus);
  res.setHeader('X-Satellite-Cache-Age', page.cacheAgeMs.toString());
  res.json({
    page: page.page,
    country: page.country,
    count: page.satellites.length,
    satellites: page.satellites.map(serializeSatellite),
    parseFailures: page.parseFailures.map((failure) => ({
      index: failure.index,
      reason: failure.reason
    })),
    metadata: {
      cacheStatus: page.cacheStatus,
      cacheAgeMs: page.cacheAgeMs,
      fetchedAt: new Date(page.fetchedAt).toISOString()
    }
  });
}

export function sendError(req: Request, res: Response, err: unknown, event: string): void {
  const status = httpStatusFor(err);
  const requestId = req.requestId;
  const fields = {
    requestId,
    status,
    error: errorMessage(err),
    query: req.query,
    params: req.params
  };

  if (status >= 500) {
    logError(event, fields);
  } else {
    logWarn(event, fields);
  }

  if (err instanceof RateLimitExhaustedError) {
    res.setHeader('Retry-After', String(Math.max(1, Math.ceil(1 / err.requestsPerSecond))));
  }

  res.status(status).json({
    error: isOrbitCatalogError(err) ? err.message : 'Erreur interne du serveur',
    code: isOrbitCatalogError(err) ? err.code : 'internal',
    requestId
  });
}
