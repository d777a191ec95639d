import { BlankNode, DataFactory, NamedNode } from 'n3';
import type { CandidateIdentifier, ParsedIdentifier } from './types/resolution.js';

const { namedNode, blankNode } = DataFactory;

/**
 * Schemes accepted as absolute identifiers without a base.
 */
export const KNOWN_SCHEMES: ReadonlySet<string> = new Set([
    'http', 'https', 'ftp', 'ftps', 'file', 'urn', 'info', 'tag',
    'mailto', 'ldap', 'ldaps', 'doi', 'ark', 'data',
]);

export function isBlankNode(value: CandidateIdentifier): value is BlankNode {
    return typeof value !== 'string' && value.termType === 'BlankNode';
}

function absoluteIri(value: string): string | undefined {
    const scheme = /^([a-zA-Z][a-zA-Z0-9+.-]*):/.exec(value);
    if (!scheme || !KNOWN_SCHEMES.has(scheme[1].toLowerCase())) {
        return undefined;
    }
    return URL.canParse(value) ? value : undefined;
}

/**
 * Reads a candidate as an RDF identifier. Never throws; a string that cannot
 * be read comes back as `unparsed` with its original form.
 */
export function parseIdentifier(candidate: CandidateIdentifier, baseUri?: string): ParsedIdentifier {
    if (typeof candidate !== 'string') {
        return { kind: 'parsed', term: candidate };
    }

    if (candidate.startsWith('_:')) {
        return { kind: 'parsed', term: blankNode(candidate.slice(2)) };
    }

    const absolute = absoluteIri(candidate);
    if (absolute !== undefined) {
        return { kind: 'parsed', term: namedNode(absolute) };
    }

    if (baseUri && !candidate.startsWith(baseUri)) {
        const separator = /[/#]$/.test(baseUri) ? '' : '/';
        const joined = baseUri + separator + candidate;
        if (URL.canParse(joined)) {
            return { kind: 'parsed', term: namedNode(joined) };
        }
    }

    return {
        kind: 'unparsed',
        original: candidate,
        reason: `could not make a valid IRI from "${candidate}"`,
    };
}

export function identifierString(value: NamedNode | BlankNode | string): string {
    return typeof value === 'string' ? value : value.value;
}
