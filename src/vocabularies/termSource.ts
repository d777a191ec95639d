import { DataFactory, NamedNode } from 'n3';
import type { TermSource } from '../types/vocabulary.js';

const { namedNode } = DataFactory;

export interface StaticTermSourceOptions {
    namespace: string;
    terms?: readonly string[];
    strict?: boolean;
}

/**
 * Term source over a fixed list of term names.
 *
 * `termFor` builds an IRI for any name, so an open vocabulary can still mint
 * terms it does not list; `hasTerm` only answers for the listed ones.
 */
export class StaticTermSource implements TermSource {
    readonly namespace: string;
    private readonly terms: Set<string>;
    private readonly strict: boolean;

    constructor(options: StaticTermSourceOptions) {
        this.namespace = options.namespace;
        this.terms = new Set(options.terms ?? []);
        this.strict = options.strict ?? false;
    }

    hasTerm(name: string): boolean {
        return this.terms.has(name);
    }

    termFor(name: string): NamedNode {
        return namedNode(this.namespace + name);
    }

    listTerms(): NamedNode[] {
        return Array.from(this.terms, (name) => this.termFor(name));
    }

    isStrict(): boolean {
        return this.strict;
    }
}
