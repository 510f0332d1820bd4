import { beforeEach, describe, expect, it } from 'vitest';

import {
  ConfigurationError,
  EndpointUnavailableError,
  InvalidArgumentError,
  NetworkError,
  RateLimitExhaustedError,
  UpstreamError
} from '../../errors';
import { FakeUpstream, satellite, timeoutError } from '../../__tests__/support/fakeUpstream';
import { ManualClock } from '../../__tests__/support/manualClock';
import { UpHereClient, type UpHereClientOptions } from '../upHereClient';

const TOO_MANY = { status: 429, data: { message: 'Too many requests' } };

describe('UpHereClient', () => {
  let upstream: FakeUpstream;
  let clock: ManualClock;

  function createClient(options: UpHereClientOptions = {}): UpHereClient {
    return new UpHereClient({
      apiKey: 'test-key',
      apiHost: 'uphere.test',
      clock,
      http: upstream.http,
      ...options
    });
  }

  beforeEach(() => {
    upstream = new FakeUpstream();
    clock = new ManualClock();
  });

  describe('configuration', () => {
    it('fails before any request when the API key is missing', async () => {
      const client = createClient({ apiKey: undefined });

      await expect(client.getSatelliteList(1)).rejects.toBeInstanceOf(ConfigurationError);
      expect(upstream.calls).toHaveLength(0);
      expect(client.getRequestStats().totalRequests).toBe(0);
    });

    it('treats a blank API key as missing', async () => {
      const client = createClient({ apiKey: '   ' });

      await expect(client.getCountries()).rejects.toBeInstanceOf(ConfigurationError);
      expect(upstream.calls).toHaveLength(0);
    });
  });

  describe('getSatelliteList', () => {
    it('sends credentials, page and filters', async () => {
      upstream.reply({ status: 200, data: [satellite(25544, 'ISS (ZARYA)')] });
      const client = createClient();

      const records = await client.getSatelliteList(2, { text: ' iss ', country: 'US' });

      expect(records).toEqual([{ number: 25544, name: 'ISS (ZARYA)', type: 'PAYLOAD' }]);
      expect(upstream.calls).toEqual([
        {
          url: '/satellite/list',
          params: { page: 2, text: 'iss', country: 'US' },
          apiKey: 'test-key',
          apiHost: 'uphere.test'
        }
      ]);
    });

    it('leaves out empty filters', async () => {
      const client = createClient();

      await client.getSatelliteList(1, { text: '', country: '  ' });

      expect(upstream.calls[0].params).toEqual({ page: 1 });
    });

    it.each([0, -3, 1.5, Number.NaN])('refuses page %s without calling upstream', async (page) => {
      const client = createClient();

      await expect(client.getSatelliteList(page)).rejects.toBeInstanceOf(InvalidArgumentError);
      expect(upstream.calls).toHaveLength(0);
    });

    it('treats a non-array payload as an upstream error', async () => {
      upstream.reply({ status: 200, data: { message: 'maintenance' } });
      const client = createClient();

      await expect(client.getSatelliteList(1)).rejects.toMatchObject({
        status: 200,
        body: '{"message":"maintenance"}'
      });
    });
  });

  describe('rate limiting', () => {
    it('recovers from three 429s with 1s, 2s and 3s of backoff', async () => {
      upstream.reply(TOO_MANY, TOO_MANY, TOO_MANY, { status: 200, data: [satellite(1, 'A')] });
      const client = createClient();

      const records = await client.getSatelliteList(1);

      expect(records).toHaveLength(1);
      expect(clock.sleeps).toEqual([1_000, 2_000, 3_000]);
      expect(client.getRequestStats().totalRequests).toBe(4);
    });

    it('surfaces exhaustion after the fourth 429 and counts every attempt', async () => {
      upstream.reply(TOO_MANY, TOO_MANY, TOO_MANY, TOO_MANY);
      const client = createClient();

      const error = await client.getSatelliteList(1).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(RateLimitExhaustedError);
      expect(error).toMatchObject({ attempts: 4, totalWaitMs: 6_000, requestsPerSecond: 1 });
      expect(String(error)).toContain('setRateLimit()');
      expect(upstream.calls).toHaveLength(4);
      expect(client.getRequestStats().totalRequests).toBe(4);
    });

    it('paces back-to-back calls at the configured rate', async () => {
      const client = createClient({ requestsPerSecond: 2 });

      await client.getSatelliteList(1);
      await client.getSatelliteList(2);
      await client.getSatelliteList(3);

      expect(clock.sleeps).toEqual([500, 500]);
    });
  });

  describe('failures', () => {
    it('reports a 404 on a tier-gated endpoint as unavailable', async () => {
      upstream.reply({ status: 404, data: { message: 'Endpoint does not exist' } });
      const client = createClient();

      const error = await client.getSatelliteDetails('25544').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(EndpointUnavailableError);
      expect(error).toMatchObject({ endpoint: '/satellite/:id/details', code: 'endpoint_unavailable' });
    });

    it('keeps a 404 on the list endpoint as a plain upstream error', async () => {
      upstream.reply({ status: 404, data: 'Not Found' });
      const client = createClient();

      const error = await client.getSatelliteList(1).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(UpstreamError);
      expect(error).toMatchObject({ status: 404, body: 'Not Found' });
    });

    it('passes other statuses through without retrying', async () => {
      upstream.reply({ status: 500, data: 'boom' });
      const client = createClient();

      await expect(client.getLaunchSites()).rejects.toMatchObject({ status: 500, body: 'boom' });
      expect(upstream.calls).toHaveLength(1);
      expect(clock.sleeps).toEqual([]);
    });

    it('flags a timed out attempt and still counts it', async () => {
      upstream.reply(timeoutError());
      const client = createClient();

      const error = await client.getSatelliteList(1).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(NetworkError);
      expect(error).toMatchObject({ timedOut: true });
      expect(client.getRequestStats().totalRequests).toBe(1);
    });
  });

  describe('request stats', () => {
    it('tracks the last request and whether another may go now', async () => {
      clock.advance(10_000);
      const client = createClient();

      expect(client.getRequestStats()).toEqual({
        rateLimit: 1,
        totalRequests: 0,
        lastRequestAt: null,
        minRequestIntervalMs: 1_000,
        timeUntilNextAllowedMs: 0,
        canMakeRequestNow: true
      });

      await client.getSatelliteList(1);
      expect(client.getRequestStats()).toMatchObject({
        totalRequests: 1,
        lastRequestAt: 10_000,
        timeUntilNextAllowedMs: 1_000,
        canMakeRequestNow: false
      });

      clock.advance(1_000);
      expect(client.getRequestStats().canMakeRequestNow).toBe(true);
    });

    it('reconfigures the ceiling', () => {
      const client = createClient();

      client.setRateLimit(5);

      expect(client.getRequestStats()).toMatchObject({ rateLimit: 5, minRequestIntervalMs: 200 });
      expect(() => client.setRateLimit(0)).toThrow(InvalidArgumentError);
    });
  });

  describe('catalog and tiered endpoints', () => {
    it('keeps well-formed countries only', async () => {
      upstream.reply({
        status: 200,
        data: [
          { id: 1, name: 'United States', abbreviation: 'US' },
          { name: 'Broken' },
          { id: 7, name: 'France', abbreviation: 'FR' }
        ]
      });
      const client = createClient();

      await expect(client.getCountries()).resolves.toEqual([
        { id: 1, name: 'United States', abbreviation: 'US' },
        { id: 7, name: 'France', abbreviation: 'FR' }
      ]);
      expect(upstream.calls[0].url).toBe('/satellite/list/countries');
    });

    it('returns launch sites as records', async () => {
      upstream.reply({ status: 200, data: [{ name: 'Baikonur', country: 'KZ' }, 42] });
      const client = createClient();

      await expect(client.getLaunchSites()).resolves.toEqual([{ name: 'Baikonur', country: 'KZ' }]);
      expect(upstream.calls[0].url).toBe('/satellite/list/launch-sites');
    });

    it('requests an orbit with the default 90 minute period', async () => {
      upstream.reply({
        status: 200,
        data: [
          { lat: 10.5, lng: -20.25, date: '2024-05-01T00:00:00Z' },
          { lat: 'bad' },
          { lat: 11, lng: -19, date: '2024-05-01T00:01:00Z' }
        ]
      });
      const client = createClient();

      const points = await client.getSatelliteOrbit(25544);

      expect(points).toEqual([
        { lat: 10.5, lng: -20.25, date: '2024-05-01T00:00:00Z' },
        { lat: 11, lng: -19, date: '2024-05-01T00:01:00Z' }
      ]);
      expect(upstream.calls[0]).toMatchObject({ url: '/satellite/25544/orbit', params: { period: 90 } });
    });

    it('sends location options', async () => {
      upstream.reply({ status: 200, data: { coordinates: [1, 2], height: 400 } });
      const client = createClient();

      await client.getSatelliteLocation('25544', { lat: 48.85, lng: 2.35, units: 'metric' });

      expect(upstream.calls[0]).toMatchObject({
        url: '/satellite/25544/location',
        params: { units: 'metric', lat: 48.85, lng: 2.35 }
      });
    });

    it('rejects a non-numeric NORAD id', async () => {
      const client = createClient();

      await expect(client.getSatelliteDetails('../admin')).rejects.toBeInstanceOf(InvalidArgumentError);
      expect(upstream.calls).toHaveLength(0);
    });

    it('parses details into an orbital object', async () => {
      upstream.reply({ status: 200, data: { number: 25544, name: 'ISS (ZARYA)', type: 'PAYLOAD', country: 'ISS' } });
      const client = createClient();

      const object = await client.getSatelliteById(25544);

      expect(object).toMatchObject({ noradId: '25544', name: 'ISS (ZARYA)', objectType: 'payload', country: 'ISS' });
    });

    it('queries satellites visible from a location', async () => {
      upstream.reply({ status: 200, data: [{ name: 'ISS', number: 25544, coordinates: [2.1, 48.7] }, 'noise'] });
      const client = createClient();

      const visible = await client.getVisibleSatellites(48.85, 2.35);

      expect(visible).toEqual([{ name: 'ISS', number: 25544, coordinates: [2.1, 48.7] }]);
      expect(upstream.calls[0]).toMatchObject({ url: '/user/visible', params: { lat: 48.85, lng: 2.35 } });
    });
  });
});
