import * as functions from 'firebase-functions/v1';
import * as logger from 'firebase-functions/logger';
import type { Express } from 'express';
import { createApp } from './api/routes';
import { buildAppDeps, buildIngestDeps } from './bootstrap';
import { DEFAULT_TIME_ZONE, loadConfig, type AppConfig } from './config';
import { describeError } from './errors';
import { refreshAllProviders, type IngestDeps } from './workers/providerIngest';

const SECRETS = ['API_KEY', 'JWT_SECRET', 'TICKETMASTER_API_KEY', 'SEARCHAPI_API_KEY'];

let cachedConfig: AppConfig | null = null;
let cachedIngestDeps: IngestDeps | null = null;
let cachedApp: Express | null = null;

function resolveConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

function resolveIngestDeps(): IngestDeps {
  if (!cachedIngestDeps) {
    cachedIngestDeps = buildIngestDeps(resolveConfig());
  }
  return cachedIngestDeps;
}

function resolveApp(): Express {
  if (!cachedApp) {
    cachedApp = createApp(buildAppDeps(resolveConfig(), resolveIngestDeps()));
  }
  return cachedApp;
}

export const refreshProviders = functions
  .runWith({
    timeoutSeconds: 540,
    memory: '512MB',
    secrets: SECRETS,
  })
  .pubsub
  .schedule('0 */6 * * *')
  .timeZone(DEFAULT_TIME_ZONE)
  .onRun(async () => {
    try {
      const results = await refreshAllProviders(resolveIngestDeps());
      for (const stats of results) {
        logger.info(
          `[${stats.provider}] fetched=${stats.fetched} added=${stats.added} skipped=${stats.skipped} failed=${stats.failed}`,
        );
      }
    } catch (error) {
      logger.error('Scheduled provider refresh failed', { error: describeError(error) });
    }

    return null;
  });

export const api = functions
  .runWith({
    timeoutSeconds: 120,
    memory: '256MB',
    secrets: SECRETS,
  })
  .https.onRequest((req, res) => {
    resolveApp()(req, res);
  });
