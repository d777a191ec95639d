import type { Literal } from 'n3';
import type { LabeledRecord } from './types/record.js';
import { DEFAULTS, LabelOptions } from './types/options.js';

/**
 * Picks display labels for records, preferring configured languages.
 */
export class LabelSelector {
    private readonly preferredLanguages: readonly string[];

    constructor(options: LabelOptions = {}) {
        this.preferredLanguages = options.preferredLanguages ?? DEFAULTS.preferredLanguages;
    }

    /**
     * Labels from the first predicate that has any values, narrowed to the
     * first preferred language present. Falls back to the record's IRI, or to
     * nothing for an anonymous record.
     */
    selectLabel(record: LabeledRecord, preferredLanguages: readonly string[] = this.preferredLanguages): string[] {
        const predicates = [...record.labelPredicates, ...DEFAULTS.labelPredicates];

        for (const predicate of predicates) {
            const labels = this.labelsInPreferredLanguage(record.values(predicate), preferredLanguages);
            if (labels.length > 0) {
                return labels;
            }
        }

        return record.subject.termType === 'BlankNode' ? [] : [record.subject.value];
    }

    private labelsInPreferredLanguage(values: Literal[], preferredLanguages: readonly string[]): string[] {
        for (const language of preferredLanguages) {
            const matches = values.filter((literal) => literal.language === language);
            if (matches.length > 0) {
                return matches.map((literal) => literal.value);
            }
        }
        return values.map((literal) => literal.value);
    }
}
