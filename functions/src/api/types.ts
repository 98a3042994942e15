import type { AppConfig } from '../config';
import type { ProviderAdapter } from '../connectors/providerAdapters';
import type { CredentialService } from '../middleware/auth';
import type { DataStore } from '../store/types';

export interface AppDeps {
  store: DataStore;
  config: Pick<AppConfig, 'apiKey' | 'defaultRadiusKm' | 'defaultRankingStrategy'>;
  credentials: CredentialService;
  adapters: ProviderAdapter[];
}
