import * as logger from 'firebase-functions/logger';
import type { ProviderAdapter } from '../connectors/providerAdapters';
import { describeError, NotFoundError, UpstreamFailureError } from '../errors';
import type { RawProviderItem } from '../models/provider';
import { ingestEvent, ingestNews, type IngestOutcome } from '../services/ingestionDeduplicator';
import type { DataStore } from '../store/types';

export interface IngestStats {
  provider: string;
  fetched: number;
  added: number;
  skipped: number;
  failed: number;
  error?: string;
}

export interface IngestDeps {
  store: DataStore;
  adapters: ProviderAdapter[];
}

export type ProviderKind = ProviderAdapter['kind'];

export async function ingestProvider(adapter: ProviderAdapter, store: DataStore): Promise<IngestStats> {
  const stats: IngestStats = { provider: adapter.id, fetched: 0, added: 0, skipped: 0, failed: 0 };

  let payloads: RawProviderItem[];
  try {
    payloads = await adapter.fetchRawItems();
  } catch (error) {
    logger.error('Provider fetch failed', { provider: adapter.id, error: describeError(error) });
    return { ...stats, error: describeError(error) };
  }
  stats.fetched = payloads.length;

  for (const payload of payloads) {
    let outcome: IngestOutcome;
    try {
      outcome = await storePayload(adapter, payload, store);
    } catch (error) {
      stats.failed += 1;
      logger.warn('Failed to ingest provider item', {
        provider: adapter.id,
        error: describeError(error),
      });
      continue;
    }
    if (outcome === 'added') {
      stats.added += 1;
    } else {
      stats.skipped += 1;
    }
  }

  logger.info('Provider ingest complete', { ...stats });
  return stats;
}

async function storePayload(
  adapter: ProviderAdapter,
  payload: RawProviderItem,
  store: DataStore,
): Promise<IngestOutcome> {
  if (adapter.kind === 'event') {
    return ingestEvent(store, adapter.normalize(payload));
  }
  return ingestNews(store, adapter.normalize(payload));
}

/** Runs one provider by id. With `kind`, providers of the other kind count as unknown. */
export async function runIngestion(providerName: string, deps: IngestDeps, kind?: ProviderKind): Promise<IngestStats> {
  const adapter = deps.adapters.find(candidate => candidate.id === providerName && (!kind || candidate.kind === kind));
  if (!adapter) {
    throw new NotFoundError(kind ? `Unknown ${kind} provider: ${providerName}` : `Unknown provider: ${providerName}`);
  }
  return ingestProvider(adapter, deps.store);
}

/**
 * Runs every provider of the given kind one after another. A provider that
 * fails only zeroes its own stats; the run fails when none succeeded.
 */
export async function refreshAllProviders(deps: IngestDeps, kind?: ProviderKind): Promise<IngestStats[]> {
  const adapters = kind ? deps.adapters.filter(adapter => adapter.kind === kind) : deps.adapters;
  const results: IngestStats[] = [];

  for (const adapter of adapters) {
    results.push(await ingestProvider(adapter, deps.store));
  }

  if (results.length > 0 && results.every(result => result.error !== undefined)) {
    throw new UpstreamFailureError(
      `All providers failed: ${results.map(result => `${result.provider} (${result.error ?? 'unknown'})`).join(', ')}`,
    );
  }
  return results;
}
