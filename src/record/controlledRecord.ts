import { BlankNode, DataFactory, Literal, NamedNode } from 'n3';
import type { LabeledRecord } from '../types/record.js';
import type { CandidateIdentifier, Resolution } from '../types/resolution.js';
import type { SearchHit, TripleStore } from '../types/store.js';
import type { VocabularyRegistry } from '../vocabularies/registry.js';
import { TermResolver, resolvedIdentity } from '../resolver.js';
import { LabelSelector } from '../labels.js';
import { VocabularySearch } from '../search/vocabularySearch.js';
import { QuestioningAuthority } from '../search/authority.js';
import { parseIdentifier } from '../identifiers.js';
import { PREDICATES } from '../vocabularies/namespaces.js';

const { blankNode, namedNode } = DataFactory;

export interface ControlledRecordTypeOptions {
    registry: VocabularyRegistry;
    store: TripleStore;
    /** Label predicates declared by the record type, tried before the defaults. */
    labelPredicates?: string[];
    preferredLanguages?: string[];
    baseUri?: string;
}

/**
 * A record type bound to a set of controlled vocabularies. Everything here is
 * shared by the records it creates; records only read it.
 */
export class ControlledRecordType {
    readonly registry: VocabularyRegistry;
    readonly resolver: TermResolver;
    readonly labels: LabelSelector;
    readonly authority: QuestioningAuthority;
    readonly labelPredicates: readonly string[];
    readonly baseUri?: string;

    constructor(options: ControlledRecordTypeOptions) {
        this.registry = options.registry;
        this.baseUri = options.baseUri;
        this.labelPredicates = options.labelPredicates ?? [];
        this.resolver = new TermResolver({ baseUri: options.baseUri });
        this.labels = new LabelSelector({ preferredLanguages: options.preferredLanguages });
        this.authority = new QuestioningAuthority(
            new VocabularySearch(options.store),
            this.registry,
            this.labelPredicates
        );
    }

    /**
     * New record, anonymous unless an identity is given and accepted.
     */
    create(identity?: CandidateIdentifier): ControlledRecord {
        const record = new ControlledRecord(this);
        if (identity !== undefined) {
            record.setSubject(identity);
        }
        return record;
    }
}

export class ControlledRecord implements LabeledRecord {
    private currentSubject: NamedNode | BlankNode = blankNode();
    private readonly literals: Map<string, Literal[]> = new Map();

    constructor(readonly type: ControlledRecordType) {}

    get subject(): NamedNode | BlankNode {
        return this.currentSubject;
    }

    get labelPredicates(): readonly string[] {
        return this.type.labelPredicates;
    }

    /**
     * Adopts the vocabulary term a candidate resolves to.
     * Returns false, leaving the identity as it was, when the candidate is rejected.
     */
    setSubject(candidate: CandidateIdentifier): boolean {
        const resolution = this.resolve(candidate);
        const identity = resolvedIdentity(resolution);
        if (identity === undefined) {
            return false;
        }
        this.currentSubject = typeof identity === 'string' ? this.toNamedNode(identity) : identity;
        return true;
    }

    resolve(candidate: CandidateIdentifier): Resolution {
        return this.type.resolver.resolve(candidate, this.type.registry);
    }

    inVocab(): boolean {
        return this.type.resolver.inVocab(this.currentSubject, this.type.registry);
    }

    rdfLabel(): string[] {
        return this.type.labels.selectLabel(this);
    }

    add(predicate: string, value: Literal): this {
        const existing = this.literals.get(predicate);
        if (existing) {
            existing.push(value);
        } else {
            this.literals.set(predicate, [value]);
        }
        return this;
    }

    values(predicate: string): Literal[] {
        return [...(this.literals.get(predicate) ?? [])];
    }

    hiddenLabels(): string[] {
        return this.values(PREDICATES.hiddenLabel).map((literal) => literal.value);
    }

    search(query: string, subAuthority?: string): Promise<SearchHit[]> {
        return this.type.authority.search(query, subAuthority);
    }

    results(): SearchHit[] {
        return this.type.authority.results();
    }

    getFullRecord(id: string, subAuthority?: string): undefined {
        return this.type.authority.getFullRecord(id, subAuthority);
    }

    // An unparseable identity is kept verbatim as the IRI value.
    private toNamedNode(identity: string): NamedNode {
        const parsed = parseIdentifier(identity, this.type.baseUri);
        if (parsed.kind === 'parsed' && parsed.term.termType === 'NamedNode') {
            return parsed.term;
        }
        return namedNode(identity);
    }
}
