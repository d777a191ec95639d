import { DataFactory } from 'n3';
import { parseIdentifier, isBlankNode } from '../src/identifiers.js';

const { blankNode, namedNode } = DataFactory;

describe('parseIdentifier', () => {
    test('reads absolute IRIs with a known scheme', () => {
        const parsed = parseIdentifier('http://example.org/a');

        expect(parsed.kind).toBe('parsed');
        expect(parsed.kind === 'parsed' && parsed.term.termType).toBe('NamedNode');
        expect(parsed.kind === 'parsed' && parsed.term.value).toBe('http://example.org/a');
    });

    test('accepts URNs and info URIs', () => {
        expect(parseIdentifier('urn:isbn:0451450523').kind).toBe('parsed');
        expect(parseIdentifier('info:lc/authorities/sh85021262').kind).toBe('parsed');
    });

    test('turns _: labels into blank nodes', () => {
        const parsed = parseIdentifier('_:b7');

        expect(parsed.kind === 'parsed' && parsed.term.termType).toBe('BlankNode');
        expect(parsed.kind === 'parsed' && parsed.term.value).toBe('b7');
    });

    test('returns terms unchanged', () => {
        const node = namedNode('http://example.org/a');
        expect(parseIdentifier(node)).toEqual({ kind: 'parsed', term: node });
    });

    test('leaves unknown schemes and plain words unparsed', () => {
        expect(parseIdentifier('vocab:term')).toEqual({
            kind: 'unparsed',
            original: 'vocab:term',
            reason: 'could not make a valid IRI from "vocab:term"',
        });
        expect(parseIdentifier('plain').kind).toBe('unparsed');
    });

    test('leaves malformed IRIs unparsed', () => {
        expect(parseIdentifier('http://exa mple.org/').kind).toBe('unparsed');
    });

    test('joins relative strings to a base', () => {
        const slash = parseIdentifier('cats', 'http://example.org/subjects');
        const hash = parseIdentifier('cats', 'http://example.org/terms#');

        expect(slash.kind === 'parsed' && slash.term.value).toBe('http://example.org/subjects/cats');
        expect(hash.kind === 'parsed' && hash.term.value).toBe('http://example.org/terms#cats');
    });
});

describe('isBlankNode', () => {
    test('recognizes only blank node terms', () => {
        expect(isBlankNode(blankNode('x'))).toBe(true);
        expect(isBlankNode(namedNode('http://example.org/x'))).toBe(false);
        expect(isBlankNode('_:x')).toBe(false);
    });
});
