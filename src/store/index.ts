import type { TripleStore } from '../types/store.js';
import type { VocabularyEnvConfig } from '../config.js';
import { N3TripleStore } from './n3Store.js';
import { SparqlEndpointStore } from './sparqlEndpoint.js';

export { N3TripleStore } from './n3Store.js';
export { SparqlEndpointStore, SparqlEndpointOptions } from './sparqlEndpoint.js';
export { loadVocabularies, loadVocabulary, LoadOptions, LoadReport, Fetcher } from './loader.js';

/**
 * Remote endpoint when one is configured, otherwise an empty in-process store.
 */
export function createTripleStore(config: Pick<VocabularyEnvConfig, 'sparqlEndpoint' | 'fetchTimeoutMs'>): TripleStore {
    if (config.sparqlEndpoint) {
        return new SparqlEndpointStore({ endpoint: config.sparqlEndpoint, timeoutMs: config.fetchTimeoutMs });
    }
    return new N3TripleStore();
}
