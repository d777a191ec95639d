import { PREDICATES } from '../vocabularies/namespaces.js';

export interface LabelOptions {
    preferredLanguages?: readonly string[];
}

export interface SearchOptions {
    /** Record-declared label predicates, added to the priority set. */
    labelPredicates?: readonly string[];
}

export const DEFAULTS = {
    preferredLanguages: ['en', 'en-us'],
    /** Tried after a record's own label predicates, in this order. */
    labelPredicates: [
        PREDICATES.prefLabel,
        PREDICATES.title,
        PREDICATES.label,
        PREDICATES.altLabel,
        PREDICATES.hiddenLabel,
        PREDICATES.value,
    ],
    /** Hits built from these predicates are preferred over incidental literal matches. */
    searchPriorityPredicates: [
        PREDICATES.prefLabel,
        PREDICATES.title,
        PREDICATES.label,
    ],
    fetchTimeoutMs: 10000,
} as const;
