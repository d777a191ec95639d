import { z } from 'zod';
import catalogData from './catalog.json';
import { StaticTermSource } from './termSource.js';
import type { CatalogEntry, TermSource } from '../types/vocabulary.js';
import { createInvalidConfigError } from '../types/errors.js';

const CatalogEntrySchema = z.object({
    prefix: z.string().min(1),
    source: z.string().url().optional(),
    strict: z.boolean().optional(),
    terms: z.array(z.string().min(1)).optional(),
});

const CatalogSchema = z.record(CatalogEntrySchema);

/**
 * System-wide table of vocabularies a record type may register.
 */
export class VocabularyCatalog {
    private readonly entries: Map<string, CatalogEntry>;

    constructor(entries: Record<string, CatalogEntry>) {
        const parsed = CatalogSchema.safeParse(entries);
        if (!parsed.success) {
            throw createInvalidConfigError('vocabulary catalog is malformed', {
                issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
            });
        }
        this.entries = new Map(Object.entries(parsed.data));
    }

    has(name: string): boolean {
        return this.entries.has(name);
    }

    get(name: string): CatalogEntry | undefined {
        return this.entries.get(name);
    }

    names(): string[] {
        return Array.from(this.entries.keys());
    }

    /**
     * Term source for a catalog entry. The entry's prefix doubles as the
     * namespace its terms are minted in.
     */
    termSourceFor(name: string): TermSource | undefined {
        const entry = this.entries.get(name);
        if (!entry) return undefined;
        return new StaticTermSource({
            namespace: entry.prefix,
            terms: entry.terms,
            strict: entry.strict,
        });
    }
}

let defaultCatalog: VocabularyCatalog | undefined;

export function getDefaultCatalog(): VocabularyCatalog {
    if (!defaultCatalog) {
        defaultCatalog = new VocabularyCatalog(catalogData);
    }
    return defaultCatalog;
}
