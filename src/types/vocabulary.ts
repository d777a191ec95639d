import type { NamedNode } from 'n3';

/**
 * The capability every vocabulary exposes: does it define a term of this name.
 * Strict and open vocabularies implement the same interface.
 */
export interface TermSource {
    /** IRI every term of this vocabulary starts with. */
    readonly namespace: string;
    hasTerm(name: string): boolean;
    termFor(name: string): NamedNode;
    listTerms?(): NamedNode[];
    isStrict?(): boolean;
}

export interface VocabularyConfig {
    name: string;
    prefix: string;
    termSource: TermSource;
    strict: boolean;
    sourceDocument?: string;
}

/**
 * Caller-supplied overrides for `VocabularyRegistry.register`.
 */
export type VocabularyOverrides = Partial<Omit<VocabularyConfig, 'name'>>;

export interface CatalogEntry {
    prefix: string;
    source?: string;
    strict?: boolean;
    terms?: string[];
}
