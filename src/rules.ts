import { catalogEntries } from './json-document.js';
import { PLURAL_SUFFIXES, type Finding, type PluralSuffix, createFinding } from './utils.js';

/**
 * Finds keys whose translation is exactly "" (whitespace-only text is a real value).
 * Non-string values and non-object documents are not inspected.
 */
export function findEmptyTranslations(data: unknown): Finding[] {
    const findings: Finding[] = [];

    for (const [key, value] of catalogEntries(data)) {
        if (typeof value === 'string' && value === '') {
            findings.push(createFinding(key, 'EmptyValue', 'translation value is an empty string'));
        }
    }

    return findings;
}

/**
 * Returns the plural suffix the text ends with, if any.
 * Matching is case-sensitive and anchored at the very end of the text.
 */
export function findTerminalPluralSuffix(value: string): PluralSuffix | null {
    return PLURAL_SUFFIXES.find((suffix) => value.endsWith(suffix)) ?? null;
}

/**
 * Finds plural suffixes (_one, _other, ...) at the end of translation values.
 * They belong in the key:
 *   BAD:  "count": "{{count}} item found_one"
 *   GOOD: "count_one": "{{count}} item found"
 */
export function findPluralSuffixInValues(data: unknown): Finding[] {
    const findings: Finding[] = [];

    for (const [key, value] of catalogEntries(data)) {
        if (typeof value !== 'string') continue;

        const suffix = findTerminalPluralSuffix(value);
        if (suffix) {
            findings.push(createFinding(
                key,
                'MisplacedPluralSuffix',
                `contains "${suffix}" (should be in key, not value)`
            ));
        }
    }

    return findings;
}
