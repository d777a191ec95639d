import { DataFactory, Parser, Quad, Store } from 'n3';
import type { VocabularyConfig } from '../types/vocabulary.js';
import type { VocabularyRegistry } from '../vocabularies/registry.js';
import { createSourceUnavailableError, describeError, VocabularyException } from '../types/errors.js';
import { DEFAULTS } from '../types/options.js';

const { namedNode, quad } = DataFactory;

export type Fetcher = (url: string, init?: RequestInit) => Promise<Response>;

export interface LoadOptions {
    fetcher?: Fetcher;
    timeoutMs?: number;
}

export interface LoadReport {
    loaded: Array<{ name: string; source: string; quads: number }>;
    skipped: string[];
    failed: Array<{ name: string; error: VocabularyException }>;
}

const ACCEPT = 'text/turtle, application/n-triples, application/trig, application/n-quads;q=0.9, */*;q=0.1';

/**
 * Fetches one vocabulary's source document into `store`, in a graph named
 * after the source. Returns the number of quads added.
 */
export async function loadVocabulary(
    config: VocabularyConfig,
    store: Store,
    options: LoadOptions = {}
): Promise<number> {
    const source = config.sourceDocument;
    if (!source) return 0;

    const fetcher = options.fetcher ?? fetch;
    let text: string;
    let contentType: string | undefined;
    try {
        const response = await fetcher(source, {
            headers: { Accept: ACCEPT },
            signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULTS.fetchTimeoutMs),
        });
        if (!response.ok) {
            throw createSourceUnavailableError(config.name, source, `HTTP ${response.status}`);
        }
        contentType = response.headers.get('content-type')?.split(';')[0].trim() || undefined;
        text = await response.text();
    } catch (e) {
        if (e instanceof VocabularyException) throw e;
        throw createSourceUnavailableError(config.name, source, describeError(e), e);
    }

    let parsed: Quad[];
    try {
        parsed = new Parser({ baseIRI: source, format: contentType }).parse(text);
    } catch (e) {
        throw createSourceUnavailableError(config.name, source, `unparseable document: ${describeError(e)}`, e);
    }

    const graph = namedNode(source);
    for (const q of parsed) {
        store.addQuad(quad(q.subject, q.predicate, q.object, graph));
    }
    return parsed.length;
}

/**
 * Loads the source document of every registered vocabulary that has one.
 * A failing vocabulary is logged and reported; the rest still load.
 */
export async function loadVocabularies(
    registry: VocabularyRegistry,
    store: Store,
    options: LoadOptions = {}
): Promise<LoadReport> {
    const report: LoadReport = { loaded: [], skipped: [], failed: [] };

    for (const config of registry) {
        if (!config.sourceDocument) {
            report.skipped.push(config.name);
            continue;
        }
        try {
            const quads = await loadVocabulary(config, store, options);
            report.loaded.push({ name: config.name, source: config.sourceDocument, quads });
        } catch (e) {
            const error = e instanceof VocabularyException
                ? e
                : createSourceUnavailableError(config.name, config.sourceDocument, describeError(e), e);
            console.warn(`Failed to load vocabulary ${config.name}:`, error.message);
            report.failed.push({ name: config.name, error });
        }
    }

    return report;
}
