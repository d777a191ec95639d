import type { LiteralFilter } from '../types/store.js';

const FILTER_FUNCTION: Record<LiteralFilter['mode'], string> = {
    startsWith: 'strstarts',
    contains: 'contains',
};

/**
 * Escapes text for a single-quoted SPARQL string literal.
 */
export function escapeSparqlString(text: string): string {
    return text.replace(/[\\'"\n\r\t]/g, (ch) => {
        switch (ch) {
            case '\n': return '\\n';
            case '\r': return '\\r';
            case '\t': return '\\t';
            default: return `\\${ch}`;
        }
    });
}

/**
 * SELECT over every triple whose lower-cased object starts with, or
 * contains, the filter text.
 */
export function buildLiteralSearchQuery(filter: LiteralFilter): string {
    const fn = FILTER_FUNCTION[filter.mode];
    const text = escapeSparqlString(filter.text.toLowerCase());
    return `SELECT DISTINCT ?s ?p ?o WHERE { ?s ?p ?o. FILTER(${fn}(lcase(?o), '${text}'))}`;
}
