import { DataFactory } from 'n3';
import type { Term } from '@rdfjs/types';
import { z } from 'zod';
import type { LiteralFilter, QuerySolution, TripleStore } from '../types/store.js';
import { buildLiteralSearchQuery } from '../search/sparql.js';
import { createStoreUnavailableError, describeError, VocabularyException } from '../types/errors.js';
import { DEFAULTS } from '../types/options.js';

const { namedNode, blankNode, literal } = DataFactory;

const BindingTermSchema = z.object({
    type: z.enum(['uri', 'bnode', 'literal', 'typed-literal']),
    value: z.string(),
    'xml:lang': z.string().optional(),
    datatype: z.string().optional(),
});

const ResultsSchema = z.object({
    results: z.object({
        bindings: z.array(z.record(BindingTermSchema)),
    }),
});

type BindingTerm = z.infer<typeof BindingTermSchema>;

export interface SparqlEndpointOptions {
    endpoint: string;
    timeoutMs?: number;
    headers?: Record<string, string>;
}

function toTerm(binding: BindingTerm): Term {
    switch (binding.type) {
        case 'uri':
            return namedNode(binding.value);
        case 'bnode':
            return blankNode(binding.value);
        default: {
            const lang = binding['xml:lang'];
            if (lang) return literal(binding.value, lang);
            return binding.datatype ? literal(binding.value, namedNode(binding.datatype)) : literal(binding.value);
        }
    }
}

/**
 * Remote store reached over the SPARQL 1.1 protocol.
 */
export class SparqlEndpointStore implements TripleStore {
    private readonly endpoint: string;
    private readonly timeoutMs: number;
    private readonly headers: Record<string, string>;

    constructor(options: SparqlEndpointOptions) {
        this.endpoint = options.endpoint;
        this.timeoutMs = options.timeoutMs ?? DEFAULTS.fetchTimeoutMs;
        this.headers = options.headers ?? {};
    }

    async select(filter: LiteralFilter): Promise<QuerySolution[]> {
        const query = buildLiteralSearchQuery(filter);
        const body = await this.post(query);

        const parsed = ResultsSchema.safeParse(body);
        if (!parsed.success) {
            throw createStoreUnavailableError('malformed SPARQL results', {
                endpoint: this.endpoint,
                issues: parsed.error.issues.map((issue) => issue.message),
            });
        }

        const solutions: QuerySolution[] = [];
        for (const row of parsed.data.results.bindings) {
            const { s, p, o } = row;
            if (!s || !p || !o) continue;
            solutions.push({ subject: toTerm(s), predicate: toTerm(p), object: toTerm(o) });
        }
        return solutions;
    }

    private async post(query: string): Promise<unknown> {
        try {
            const response = await fetch(this.endpoint, {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/sparql-query',
                    'Accept': 'application/sparql-results+json',
                    ...this.headers,
                },
                body: query,
                signal: AbortSignal.timeout(this.timeoutMs),
            });

            if (!response.ok) {
                const text = await response.text();
                throw createStoreUnavailableError(`HTTP ${response.status}: ${text}`, {
                    endpoint: this.endpoint,
                    status: response.status,
                });
            }

            return await response.json();
        } catch (e) {
            if (e instanceof VocabularyException) throw e;
            throw createStoreUnavailableError(describeError(e), { endpoint: this.endpoint }, e);
        }
    }
}
