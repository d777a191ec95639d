import type { SearchHit } from '../types/store.js';
import type { VocabularyRegistry } from '../vocabularies/registry.js';
import { VocabularySearch } from './vocabularySearch.js';

/**
 * Lookup surface a record type exposes to authority-style clients.
 * Remembers the hits of the last search.
 */
export class QuestioningAuthority {
    private response: SearchHit[] = [];

    constructor(
        private readonly searcher: VocabularySearch,
        private readonly registry: VocabularyRegistry,
        private readonly labelPredicates: readonly string[] = []
    ) {}

    // sub-authorities are not distinguished; every registered vocabulary is searched
    async search(query: string, _subAuthority?: string): Promise<SearchHit[]> {
        this.response = await this.searcher.search(query, this.registry, {
            labelPredicates: this.labelPredicates,
        });
        return [...this.response];
    }

    results(): SearchHit[] {
        return [...this.response];
    }

    getFullRecord(id: string, subAuthority?: string): undefined {
        return this.searcher.getFullRecord(id, subAuthority);
    }
}
