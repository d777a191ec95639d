import type { Term } from '@rdfjs/types';

export type LiteralMatchMode = 'startsWith' | 'contains';

/**
 * Case-insensitive filter on the object position of a triple.
 * `text` is compared against the lower-cased literal value.
 */
export interface LiteralFilter {
    mode: LiteralMatchMode;
    text: string;
}

export interface QuerySolution {
    subject: Term;
    predicate: Term;
    object: Term;
}

/**
 * Backing store consulted by search. A single round trip per call; retry and
 * timeout policy belong to the implementation.
 */
export interface TripleStore {
    select(filter: LiteralFilter): Promise<QuerySolution[]>;
}

export interface SearchHit {
    id: string;
    label: string;
}
