import type { BibHarvestConfig, SourceAdapter, SourceName } from '../types/index.js';
import { ConfigurationError } from '../utils/errors.js';
import type { HttpClient } from '../utils/http-client.js';
import { ScopusAdapter } from './scopus.js';

type AdapterFactory = (config: BibHarvestConfig, httpClient?: HttpClient) => SourceAdapter;

interface SourceEntry {
    name: SourceName;
    description: string;
    create: AdapterFactory;
}

const SOURCES: readonly SourceEntry[] = [
    {
        name: 'scopus',
        description: 'Elsevier Scopus Search API (requires SCOPUS_API_KEY)',
        create: (config, httpClient) => new ScopusAdapter(config.scopus, httpClient),
    },
];

/**
 * Names and descriptions of every registered provider.
 */
export function listSources(): Array<{ name: SourceName; description: string }> {
    return SOURCES.map(({ name, description }) => ({ name, description }));
}

export function isSourceName(name: string): name is SourceName {
    return SOURCES.some((entry) => entry.name === name);
}

/**
 * Build the adapter registered under `name`.
 * Unknown names and missing credentials raise ConfigurationError.
 */
export function createSourceAdapter(name: string, config: BibHarvestConfig, httpClient?: HttpClient): SourceAdapter {
    const entry = SOURCES.find((source) => source.name === name);
    if (!entry) {
        const known = SOURCES.map((source) => source.name).join(', ');
        throw new ConfigurationError(`Unknown source "${name}". Available: ${known}`);
    }
    return entry.create(config, httpClient);
}
