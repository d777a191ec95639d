/**
 * Tests for term resolution and vocabulary membership
 */

import { DataFactory } from 'n3';
import { TermResolver, resolvedIdentity } from '../src/resolver.js';
import { VocabularyRegistry } from '../src/vocabularies/registry.js';
import { StaticTermSource } from '../src/vocabularies/termSource.js';
import { SUBJECTS, TYPES, identityOf, testCatalog, testRegistry } from './fixtures.js';

const { blankNode, namedNode } = DataFactory;

describe('TermResolver', () => {
    let resolver: TermResolver;
    let registry: VocabularyRegistry;

    beforeEach(() => {
        resolver = new TermResolver();
        registry = testRegistry();
    });

    describe('prefix matches', () => {
        test.each([
            `${SUBJECTS}cats`,
            `${SUBJECTS}anything-at-all`,
            `${SUBJECTS}nested/path#frag`,
        ])('open vocabulary keeps %s unchanged', (iri) => {
            const resolution = resolver.resolve(iri, registry);

            expect(resolution).toMatchObject({ status: 'bound', vocabulary: 'subjects', via: 'prefix' });
            expect(identityOf(resolution)).toBe(iri);
        });

        test('open vocabulary keeps a named node as given', () => {
            const node = namedNode(`${SUBJECTS}dogs`);
            const resolution = resolver.resolve(node, registry);

            expect(resolution.status).toBe('bound');
            expect(resolvedIdentity(resolution)).toBe(node);
        });

        test('strict vocabulary adopts the canonical term for a known suffix', () => {
            const resolution = resolver.resolve(`${TYPES}Image`, registry);

            expect(resolution).toMatchObject({ status: 'bound', vocabulary: 'types', via: 'prefix' });
            expect(identityOf(resolution)).toBe(`${TYPES}Image`);
        });

        test('strict vocabulary with an unknown suffix passes through unbound', () => {
            const resolution = resolver.resolve(`${TYPES}Nope`, registry);

            expect(resolution.status).toBe('unbound');
            expect(identityOf(resolution)).toBe(`${TYPES}Nope`);
        });

        test('scanning continues past a strict vocabulary that does not know the suffix', () => {
            const overlapping = new VocabularyRegistry(testCatalog());
            overlapping.register('types');
            overlapping.register('places');

            const resolution = resolver.resolve(`${TYPES}Nope`, overlapping);

            expect(resolution).toMatchObject({ status: 'bound', vocabulary: 'places', via: 'prefix' });
            expect(identityOf(resolution)).toBe(`${TYPES}Nope`);
        });

        test('unrelated identifiers pass through unbound', () => {
            const resolution = resolver.resolve('http://unrelated.org/thing', registry);

            expect(resolution.status).toBe('unbound');
            expect(identityOf(resolution)).toBe('http://unrelated.org/thing');
        });
    });

    describe('blank nodes', () => {
        test('rejects a blank node term', () => {
            expect(resolver.resolve(blankNode('b1'), registry)).toEqual({
                status: 'rejected',
                code: 'AMBIGUOUS_IDENTITY',
            });
        });

        test('rejects a blank node label string', () => {
            expect(resolver.resolve('_:b1', registry).status).toBe('rejected');
        });

        test('rejects regardless of registry contents', () => {
            const empty = new VocabularyRegistry(testCatalog());
            expect(resolver.resolve(blankNode(), empty).status).toBe('rejected');
            expect(resolvedIdentity(resolver.resolve(blankNode(), empty))).toBeUndefined();
        });
    });

    describe('term-name matches', () => {
        test('a bare term name resolves to the vocabulary term', () => {
            const resolution = resolver.resolve('Image', registry);

            expect(resolution).toMatchObject({ status: 'bound', vocabulary: 'types', via: 'term-name' });
            expect(identityOf(resolution)).toBe(`${TYPES}Image`);
        });

        test('open vocabularies offer their listed terms too', () => {
            const resolution = resolver.resolve('cats', registry);

            expect(resolution).toMatchObject({ status: 'bound', vocabulary: 'subjects', via: 'term-name' });
            expect(identityOf(resolution)).toBe(`${SUBJECTS}cats`);
        });

        test('the first vocabulary to offer a term wins', () => {
            const shared = new VocabularyRegistry(testCatalog());
            shared.register('subjects', {
                termSource: new StaticTermSource({ namespace: SUBJECTS, terms: ['Image'] }),
            });
            shared.register('types');

            const resolution = resolver.resolve('Image', shared);

            expect(resolution).toMatchObject({ status: 'bound', vocabulary: 'subjects' });
            expect(identityOf(resolution)).toBe(`${SUBJECTS}Image`);
        });

        test('a term whose IRI is not under a registered prefix is discarded', () => {
            const moved = new VocabularyRegistry(testCatalog());
            moved.register('types', { prefix: 'http://example.org/kinds/' });

            const resolution = resolver.resolve('Image', moved);

            expect(resolution).toEqual({ status: 'unbound', value: 'Image' });
        });

        test('a string that is neither an IRI nor a term passes through', () => {
            expect(resolver.resolve('not an iri', registry)).toEqual({ status: 'unbound', value: 'not an iri' });
        });
    });

    describe('base URI', () => {
        test('relative identifiers are joined to the base before matching', () => {
            const based = new TermResolver({ baseUri: 'http://example.org/subjects' });
            const resolution = based.resolve('dogs', registry);

            expect(resolution).toMatchObject({ status: 'bound', vocabulary: 'subjects', via: 'prefix' });
            expect(identityOf(resolution)).toBe(`${SUBJECTS}dogs`);
        });
    });

    describe('inVocab', () => {
        test('is false for a bare prefix', () => {
            expect(resolver.inVocab(SUBJECTS, registry)).toBe(false);
            expect(resolver.inVocab(namedNode(TYPES), registry)).toBe(false);
        });

        test('is false when no prefix matches', () => {
            expect(resolver.inVocab('http://unrelated.org/x', registry)).toBe(false);
        });

        test('strict vocabularies require a known term', () => {
            expect(resolver.inVocab(`${TYPES}Image`, registry)).toBe(true);
            expect(resolver.inVocab(`${TYPES}Nope`, registry)).toBe(false);
        });

        test('open vocabularies accept anything under the prefix', () => {
            expect(resolver.inVocab(namedNode(`${SUBJECTS}whatever`), registry)).toBe(true);
        });

        test('blank nodes are never members', () => {
            expect(resolver.inVocab(blankNode('b1'), registry)).toBe(false);
        });
    });
});
