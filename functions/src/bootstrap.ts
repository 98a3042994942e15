import type { AppDeps } from './api/types';
import type { AppConfig } from './config';
import { buildProviderAdapters } from './connectors/providerAdapters';
import { ConfigError } from './errors';
import { JwtCredentialService } from './middleware/auth';
import { createDataStore } from './store';
import type { IngestDeps } from './workers/providerIngest';

/** Store and providers only; scheduled ingestion never verifies a token. */
export function buildIngestDeps(config: AppConfig): IngestDeps {
  return {
    store: createDataStore(config),
    adapters: buildProviderAdapters(config.providers),
  };
}

export function buildAppDeps(config: AppConfig, ingest: IngestDeps = buildIngestDeps(config)): AppDeps {
  if (!config.jwtSecret) {
    throw new ConfigError('JWT_SECRET is not configured');
  }
  return {
    ...ingest,
    config,
    credentials: new JwtCredentialService(config.jwtSecret),
  };
}
