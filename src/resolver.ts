import type { BlankNode, NamedNode } from 'n3';
import type { CandidateIdentifier, Resolution } from './types/resolution.js';
import type { VocabularyRegistry } from './vocabularies/registry.js';
import { identifierString, isBlankNode, parseIdentifier } from './identifiers.js';

const REJECTED: Resolution = { status: 'rejected', code: 'AMBIGUOUS_IDENTITY' };

interface TermNameMatch {
    term: NamedNode;
    offeredBy: string;
}

export interface TermResolverOptions {
    /** Base IRI that relative identifiers are joined to. */
    baseUri?: string;
}

/**
 * Decides which vocabulary term, if any, a record identity should become.
 */
export class TermResolver {
    private readonly baseUri?: string;

    constructor(options: TermResolverOptions = {}) {
        this.baseUri = options.baseUri;
    }

    /**
     * Resolves a candidate identity against the registry.
     *
     * Vocabularies are scanned in registration order. A prefix match on an
     * open vocabulary, or on a strict one whose remainder is a known term,
     * ends the scan. Otherwise a vocabulary that defines the raw value as a
     * term name offers a candidate; the first candidate is kept only if its
     * IRI falls under a registered prefix.
     */
    resolve(candidate: CandidateIdentifier, registry: VocabularyRegistry): Resolution {
        if (isBlankNode(candidate)) {
            return REJECTED;
        }

        const parsed = parseIdentifier(candidate, this.baseUri);
        let working: NamedNode | string;
        if (parsed.kind === 'parsed') {
            if (parsed.term.termType === 'BlankNode') {
                return REJECTED;
            }
            working = parsed.term;
        } else {
            working = parsed.original;
        }

        const value = identifierString(working);
        const offered: TermNameMatch[] = [];

        for (const config of registry) {
            if (value.startsWith(config.prefix)) {
                if (!config.strict) {
                    return { status: 'bound', value: working, vocabulary: config.name, via: 'prefix' };
                }
                const suffix = value.slice(config.prefix.length);
                if (config.termSource.hasTerm(suffix)) {
                    return {
                        status: 'bound',
                        value: config.termSource.termFor(suffix),
                        vocabulary: config.name,
                        via: 'prefix',
                    };
                }
                // unknown term in a strict vocabulary; keep scanning
            } else if (config.termSource.hasTerm(value)) {
                offered.push({ term: config.termSource.termFor(value), offeredBy: config.name });
            }
        }

        if (offered.length === 0) {
            return { status: 'unbound', value: working };
        }

        // Gate 1 passed: the raw value is a term name. Gate 2: the term's IRI
        // must itself sit under a registered prefix.
        const [first] = offered;
        const confirmedBy = registry.matching(first.term.value);
        if (!confirmedBy) {
            return { status: 'unbound', value: working };
        }
        return { status: 'bound', value: first.term, vocabulary: confirmedBy.name, via: 'term-name' };
    }

    /**
     * Whether an identity is a term of one of the registered vocabularies.
     * A bare namespace is not a term.
     */
    inVocab(subject: NamedNode | BlankNode | string, registry: VocabularyRegistry): boolean {
        if (typeof subject !== 'string' && subject.termType === 'BlankNode') {
            return false;
        }
        const iri = identifierString(subject);
        const config = registry.matching(iri);
        if (!config) return false;
        if (iri === config.prefix) return false;
        if (config.strict && !config.termSource.hasTerm(iri.slice(config.prefix.length))) {
            return false;
        }
        return true;
    }
}

/**
 * The identity a record adopts for a resolution, or undefined when rejected.
 */
export function resolvedIdentity(resolution: Resolution): NamedNode | string | undefined {
    return resolution.status === 'rejected' ? undefined : resolution.value;
}
