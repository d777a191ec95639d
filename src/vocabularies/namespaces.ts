export const SKOS = 'http://www.w3.org/2004/02/skos/core#';
export const DCTERMS = 'http://purl.org/dc/terms/';
export const RDFS = 'http://www.w3.org/2000/01/rdf-schema#';
export const RDF = 'http://www.w3.org/1999/02/22-rdf-syntax-ns#';

export const PREDICATES = {
    prefLabel: `${SKOS}prefLabel`,
    altLabel: `${SKOS}altLabel`,
    hiddenLabel: `${SKOS}hiddenLabel`,
    title: `${DCTERMS}title`,
    label: `${RDFS}label`,
    value: `${RDF}value`,
} as const;
