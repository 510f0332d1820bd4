import { Router, type Request, type Response } from 'express';

import { InvalidArgumentError } from '../errors';
import type { SatelliteService } from '../services/satelliteService';
import { DEFAULT_ORBIT_PERIOD_MINUTES, type Units } from '../uphere/upHereClient';
import {
  parseForceRefresh,
  queryInteger,
  queryNumber,
  queryString,
  sendError,
  sendPage,
  serializeSatellite
} from './respond';

function parseUnits(req: Request): Units | undefined {
  const units = queryString(req, 'units');
  if (units === undefined) {
    return undefined;
  }
  if (units !== 'metric' && units !== 'imperial') {
    throw new InvalidArgumentError('units', `expected "metric" or "imperial" (got "${units}")`);
  }
  return units;
}

export function createSatellitesRouter(service: SatelliteService): Router {
  const router = Router();

  router.get('/', async (req: Request, res: Response) => {
    try {
      const page = queryInteger(req, 'page', 1);
      const result = await service.getSatellites(page, {
        requestId: req.requestId,
        forceRefresh: parseForceRefresh(req)
      });
      sendPage(res, result);
    } catch (err: unknown) {
      sendError(req, res, err, 'satellite_list_failed');
    }
  });

  router.get('/search', async (req: Request, res: Response) => {
    try {
      const name = queryString(req, 'name');
      if (!name) {
        throw new InvalidArgumentError('name', 'query parameter is required');
      }
      const maxResults = queryInteger(req, 'limit', 10);
      const matches = await service.findSatelliteByName(name, { maxResults, requestId: req.requestId });
      res.json({ query: name, count: matches.length, satellites: matches.map(serializeSatellite) });
    } catch (err: unknown) {
      sendError(req, res, err, 'satellite_search_failed');
    }
  });

  router.get('/norad/:id', async (req: Request, res: Response) => {
    try {
      const lookup = await service.findSatelliteByNoradId(req.params.id, { requestId: req.requestId });
      if (lookup.status === 'not-found') {
        res.status(404).json({
          status: lookup.status,
          noradId: req.params.id,
          pagesScanned: lookup.pagesScanned,
          requestId: req.requestId
        });
        return;
      }
      res.json({ status: lookup.status, page: lookup.page, satellite: serializeSatellite(lookup.satellite) });
    } catch (err: unknown) {
      sendError(req, res, err, 'satellite_norad_lookup_failed');
    }
  });

  router.get('/country/:code', async (req: Request, res: Response) => {
    try {
      const page = queryInteger(req, 'page', 1);
      const result = await service.getSatellitesByCountry(req.params.code, page, {
        requestId: req.requestId,
        forceRefresh: parseForceRefresh(req)
      });
      sendPage(res, result);
    } catch (err: unknown) {
      sendError(req, res, err, 'satellite_country_failed');
    }
  });

  router.get('/:id/details', async (req: Request, res: Response) => {
    try {
      res.json(await service.client.getSatelliteDetails(req.params.id, { requestId: req.requestId }));
    } catch (err: unknown) {
      sendError(req, res, err, 'satellite_details_failed');
    }
  });

  router.get('/:id/location', async (req: Request, res: Response) => {
    try {
      const location = await service.client.getSatelliteLocation(
        req.params.id,
        { lat: queryNumber(req, 'lat'), lng: queryNumber(req, 'lng'), units: parseUnits(req) },
        { requestId: req.requestId }
      );
      res.json(location);
    } catch (err: unknown) {
      sendError(req, res, err, 'satellite_location_failed');
    }
  });

  router.get('/:id/orbit', async (req: Request, res: Response) => {
    try {
      const period = queryInteger(req, 'period', DEFAULT_ORBIT_PERIOD_MINUTES);
      const points = await service.client.getSatelliteOrbit(req.params.id, period, { requestId: req.requestId });
      res.json({ noradId: req.params.id, periodMinutes: period, points });
    } catch (err: unknown) {
      sendError(req, res, err, 'satellite_orbit_failed');
    }
  });

  return router;
}
