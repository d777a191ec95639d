/**
 * Controlled Vocabularies - Library Entry Point
 *
 * Binds controlled vocabularies to record types: identity resolution,
 * membership checks, display labels and scoped keyword search.
 */

// Vocabularies
export { VocabularyRegistry } from './vocabularies/registry.js';
export { VocabularyCatalog, getDefaultCatalog } from './vocabularies/catalog.js';
export { StaticTermSource, StaticTermSourceOptions } from './vocabularies/termSource.js';
export * from './vocabularies/namespaces.js';

// Resolution and labels
export { parseIdentifier, isBlankNode, KNOWN_SCHEMES } from './identifiers.js';
export { TermResolver, TermResolverOptions, resolvedIdentity } from './resolver.js';
export { LabelSelector } from './labels.js';

// Search
export { VocabularySearch } from './search/vocabularySearch.js';
export { QuestioningAuthority } from './search/authority.js';
export { buildLiteralSearchQuery, escapeSparqlString } from './search/sparql.js';

// Stores
export * from './store/index.js';

// Records
export {
    ControlledRecord,
    ControlledRecordType,
    ControlledRecordTypeOptions,
} from './record/controlledRecord.js';

// Configuration
export { loadConfig, VocabularyEnvConfig } from './config.js';

// Types and Interfaces
export * from './types/index.js';
