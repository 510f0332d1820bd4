import { Router, type Request, type Response } from 'express';

import { InvalidArgumentError } from '../errors';
import type { SatelliteService } from '../services/satelliteService';
import { parseForceRefresh, queryNumber, sendError } from './respond';

export function createCatalogRouter(service: SatelliteService): Router {
  const router = Router();

  router.get('/countries', async (req: Request, res: Response) => {
    try {
      const countries = await service.getCountries({
        requestId: req.requestId,
        forceRefresh: parseForceRefresh(req)
      });
      res.json({ count: countries.length, countries });
    } catch (err: unknown) {
      sendError(req, res, err, 'countries_fetch_failed');
    }
  });

  router.get('/launch-sites', async (req: Request, res: Response) => {
    try {
      const sites = await service.client.getLaunchSites({ requestId: req.requestId });
      res.json({ count: sites.length, launchSites: sites });
    } catch (err: unknown) {
      sendError(req, res, err, 'launch_sites_fetch_failed');
    }
  });

  router.get('/visible', async (req: Request, res: Response) => {
    try {
      const lat = queryNumber(req, 'lat');
      const lng = queryNumber(req, 'lng');
      if (lat === undefined || lng === undefined) {
        throw new InvalidArgumentError('lat/lng', 'both query parameters are required');
      }
      const satellites = await service.client.getVisibleSatellites(lat, lng, { requestId: req.requestId });
      res.json({ count: satellites.length, satellites });
    } catch (err: unknown) {
      sendError(req, res, err, 'visible_satellites_failed');
    }
  });

  router.get('/stats', (_req: Request, res: Response) => {
    res.json({
      requests: service.client.getRequestStats(),
      cache: service.getCacheStats()
    });
  });

  return router;
}
