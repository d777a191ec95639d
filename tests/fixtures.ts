import { VocabularyCatalog } from '../src/vocabularies/catalog.js';
import { VocabularyRegistry } from '../src/vocabularies/registry.js';
import { resolvedIdentity } from '../src/resolver.js';
import { identifierString } from '../src/identifiers.js';
import type { Resolution } from '../src/types/resolution.js';

export const SUBJECTS = 'http://example.org/subjects/';
export const TYPES = 'http://example.org/types/';
export const TYPES_SOURCE = 'http://example.org/types.ttl';

export function testCatalog(): VocabularyCatalog {
    return new VocabularyCatalog({
        subjects: { prefix: SUBJECTS, terms: ['cats'] },
        types: { prefix: TYPES, strict: true, terms: ['Image', 'Text'], source: TYPES_SOURCE },
        places: { prefix: 'http://example.org/' },
    });
}

/** subjects (open) registered before types (strict). */
export function testRegistry(): VocabularyRegistry {
    const registry = new VocabularyRegistry(testCatalog());
    registry.register('subjects');
    registry.register('types');
    return registry;
}

export function identityOf(resolution: Resolution): string | undefined {
    const identity = resolvedIdentity(resolution);
    return identity === undefined ? undefined : identifierString(identity);
}
