import { buildIngestDeps } from '../bootstrap';
import { loadConfig } from '../config';
import { refreshAllProviders, runIngestion, type IngestStats, type ProviderKind } from '../workers/providerIngest';

function parseKind(value: string | undefined): ProviderKind | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (value === 'event' || value === 'news') {
    return value;
  }
  throw new Error(`--kind must be "event" or "news", got ${value}`);
}

async function run(): Promise<void> {
  const args = process.argv.slice(2);
  const kindFlag = args.find(arg => arg.startsWith('--kind='));
  const providerArg = args.find(arg => !arg.startsWith('--'));

  const deps = buildIngestDeps(loadConfig());

  console.log(`Configured providers: ${deps.adapters.map(adapter => adapter.id).join(', ') || '(none)'}`);

  let results: IngestStats[];
  if (providerArg) {
    console.log(`Starting ingest for ${providerArg}`);
    results = [await runIngestion(providerArg, deps)];
  } else {
    const kind = parseKind(kindFlag?.slice('--kind='.length));
    console.log(`Starting ingest for ${kind ?? 'all'} providers`);
    results = await refreshAllProviders(deps, kind);
  }

  for (const stats of results) {
    console.log('Ingest complete:', stats);
  }
}

run().then(
  () => process.exit(0),
  error => {
    console.error('Manual ingest failed', error);
    process.exit(1);
  },
);
