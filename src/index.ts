import { createApp } from './app';
import { type AppConfig, loadConfig } from './config/env';
import { errorMessage, logError, logInfo, logWarn, setLogLevel } from './observability/logger';
import { SatelliteService } from './services/satelliteService';
import { UpHereClient } from './uphere/upHereClient';

function readConfig(): AppConfig | null {
  try {
    return loadConfig();
  } catch (err: unknown) {
    logError('configuration_invalid', { error: errorMessage(err) });
    return null;
  }
}

function main(): void {
  const config = readConfig();
  if (!config) {
    process.exitCode = 1;
    return;
  }
  setLogLevel(config.logLevel);

  const client = new UpHereClient({
    apiKey: config.apiKey,
    apiHost: config.apiHost,
    requestsPerSecond: config.requestsPerSecond,
    timeoutMs: config.timeoutMs,
    maxRetries: config.maxRetries,
    backoffBaseMs: config.backoffBaseMs
  });
  const service = new SatelliteService(client, {
    cacheTtlMs: config.cacheTtlMs,
    maxSearchPages: config.maxSearchPages
  });

  if (!config.apiKey) {
    logWarn('api_key_missing', { hint: 'set RAPIDAPI_KEY; upstream calls will fail until it is configured' });
  }

  const app = createApp({ service });
  app.listen(config.port, () => {
    logInfo('api_server_started', {
      port: config.port,
      apiHost: config.apiHost,
      requestsPerSecond: config.requestsPerSecond,
      cacheTtlMs: config.cacheTtlMs,
      maxSearchPages: config.maxSearchPages,
      logLevel: config.logLevel
    });
  });
}

main();
