import type { QuerySolution, SearchHit, TripleStore } from '../types/store.js';
import type { VocabularyRegistry } from '../vocabularies/registry.js';
import { DEFAULTS, SearchOptions } from '../types/options.js';

/**
 * Keyword search over a triple store, scoped to a registry's vocabularies.
 *
 * Not a very smart search: a starts-with query first, and a contains query
 * only when that finds nothing.
 */
export class VocabularySearch {
    constructor(private readonly store: TripleStore) {}

    /**
     * Store failures propagate unchanged; no retry happens here.
     */
    async search(queryText: string, registry: VocabularyRegistry, options: SearchOptions = {}): Promise<SearchHit[]> {
        const text = queryText.toLowerCase();
        const labelPredicates = options.labelPredicates ?? [];

        // fall back on an empty hit list, after scoping, not on an empty store answer
        const startsWith = await this.store.select({ mode: 'startsWith', text });
        const hits = this.hitsFromSolutions(startsWith, registry, labelPredicates);
        if (hits.length > 0) {
            return hits;
        }

        const contains = await this.store.select({ mode: 'contains', text });
        return this.hitsFromSolutions(contains, registry, labelPredicates);
    }

    /**
     * Placeholder for authorities that can fetch a full record.
     */
    getFullRecord(_id: string, _subAuthority?: string): undefined {
        return undefined;
    }

    private hitsFromSolutions(
        solutions: QuerySolution[],
        registry: VocabularyRegistry,
        labelPredicates: readonly string[]
    ): SearchHit[] {
        const priority = new Set<string>([...DEFAULTS.searchPriorityPredicates, ...labelPredicates]);

        const inScope = solutions.filter((solution) => registry.usesPrefix(solution.subject.value));
        const labelled = inScope.filter((solution) => priority.has(solution.predicate.value));

        return uniqueHits(labelled.length > 0 ? labelled : inScope);
    }
}

function buildHit(solution: QuerySolution): SearchHit {
    return { id: solution.subject.value, label: solution.object.value };
}

function uniqueHits(solutions: QuerySolution[]): SearchHit[] {
    const seen = new Set<string>();
    const hits: SearchHit[] = [];
    for (const solution of solutions) {
        const hit = buildHit(solution);
        const key = JSON.stringify([hit.id, hit.label]);
        if (seen.has(key)) continue;
        seen.add(key);
        hits.push(hit);
    }
    return hits;
}
