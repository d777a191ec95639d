import { Store } from 'n3';
import type { LiteralFilter, QuerySolution, TripleStore } from '../types/store.js';

/**
 * In-process triple store backed by an n3 `Store`.
 *
 * Mirrors the SPARQL filter `FILTER(strstarts|contains(lcase(?o), text))`:
 * only literal objects take part, and duplicate triples across graphs are
 * returned once.
 */
export class N3TripleStore implements TripleStore {
    constructor(readonly store: Store = new Store()) {}

    async select(filter: LiteralFilter): Promise<QuerySolution[]> {
        const text = filter.text.toLowerCase();
        const seen = new Set<string>();
        const solutions: QuerySolution[] = [];

        for (const quad of this.store.getQuads(null, null, null, null)) {
            if (quad.object.termType !== 'Literal') continue;

            const value = quad.object.value.toLowerCase();
            const matches = filter.mode === 'startsWith' ? value.startsWith(text) : value.includes(text);
            if (!matches) continue;

            const key = JSON.stringify([quad.subject.termType, quad.subject.value, quad.predicate.value, quad.object.id]);
            if (seen.has(key)) continue;
            seen.add(key);

            solutions.push({ subject: quad.subject, predicate: quad.predicate, object: quad.object });
        }

        return solutions;
    }
}
