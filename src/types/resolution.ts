import type { BlankNode, NamedNode } from 'n3';

export type CandidateIdentifier = string | NamedNode | BlankNode;

export type ParsedIdentifier =
    | { kind: 'parsed'; term: NamedNode | BlankNode }
    | { kind: 'unparsed'; original: string; reason: string };

/**
 * Outcome of resolving a candidate identity.
 *
 * `value` is a string only when the candidate could not be read as an IRI.
 */
export type Resolution =
    | { status: 'bound'; value: NamedNode | string; vocabulary: string; via: 'prefix' | 'term-name' }
    | { status: 'unbound'; value: NamedNode | string }
    | { status: 'rejected'; code: 'AMBIGUOUS_IDENTITY' };
