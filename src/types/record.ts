import type { BlankNode, Literal, NamedNode } from 'n3';

/**
 * What label selection needs from a record.
 */
export interface LabeledRecord {
    /** Current identity; a blank node means nothing has been persisted yet. */
    readonly subject: NamedNode | BlankNode;
    /** Class-declared label predicates, tried before the defaults. */
    readonly labelPredicates: readonly string[];
    values(predicate: string): Literal[];
}
