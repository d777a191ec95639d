import type { NamedNode } from 'n3';
import type { VocabularyConfig, VocabularyOverrides } from '../types/vocabulary.js';
import { createUnknownVocabularyError } from '../types/errors.js';
import { VocabularyCatalog, getDefaultCatalog } from './catalog.js';

/**
 * Ordered set of vocabularies bound to one record type.
 *
 * Insertion order is the tie-break order everywhere: when prefixes overlap
 * the earliest registration wins.
 */
export class VocabularyRegistry implements Iterable<VocabularyConfig> {
    private readonly vocabularies: Map<string, VocabularyConfig> = new Map();

    constructor(private readonly catalog: VocabularyCatalog = getDefaultCatalog()) {}

    /**
     * Registers a catalog vocabulary. Overrides win over the catalog defaults.
     */
    register(name: string, overrides: VocabularyOverrides = {}): VocabularyConfig {
        const entry = this.catalog.get(name);
        const defaultSource = this.catalog.termSourceFor(name);
        if (!entry || !defaultSource) {
            throw createUnknownVocabularyError(name, this.catalog.names());
        }

        const termSource = overrides.termSource ?? defaultSource;
        const config: VocabularyConfig = {
            name,
            prefix: overrides.prefix ?? entry.prefix,
            termSource,
            strict: overrides.strict ?? entry.strict ?? termSource.isStrict?.() ?? false,
            sourceDocument: overrides.sourceDocument ?? entry.source,
        };

        this.vocabularies.set(name, config);
        return config;
    }

    get(name: string): VocabularyConfig | undefined {
        return this.vocabularies.get(name);
    }

    has(name: string): boolean {
        return this.vocabularies.has(name);
    }

    names(): string[] {
        return Array.from(this.vocabularies.keys());
    }

    get size(): number {
        return this.vocabularies.size;
    }

    [Symbol.iterator](): Iterator<VocabularyConfig> {
        return this.vocabularies.values();
    }

    /**
     * First vocabulary, in registration order, whose prefix starts the identifier.
     */
    matching(identifier: string): VocabularyConfig | undefined {
        for (const config of this.vocabularies.values()) {
            if (identifier.startsWith(config.prefix)) {
                return config;
            }
        }
        return undefined;
    }

    usesPrefix(identifier: string): boolean {
        return this.matching(identifier) !== undefined;
    }

    /**
     * Terms allowed by the strict vocabularies.
     *
     * Not every allowable term: open vocabularies accept anything under their
     * prefix and are left out.
     */
    listTerms(): NamedNode[] {
        const terms: NamedNode[] = [];
        for (const config of this.vocabularies.values()) {
            const source = config.termSource;
            if (!config.strict || !source.listTerms) continue;
            terms.push(...source.listTerms().filter((term) => term.value.startsWith(source.namespace)));
        }
        return terms;
    }
}
