// Shared constants and types
export const PLURAL_CATEGORIES = ['zero', 'one', 'two', 'few', 'many', 'other'] as const;

export type PluralCategory = typeof PLURAL_CATEGORIES[number];
export type PluralSuffix = `_${PluralCategory}`;

export const PLURAL_SUFFIXES: readonly PluralSuffix[] = PLURAL_CATEGORIES.map(
    (category): PluralSuffix => `_${category}`
);

/** Key used for findings that concern the whole file rather than one entry. */
export const FILE_KEY = 'FILE';

export type FindingKind = 'EmptyValue' | 'MisplacedPluralSuffix' | 'ParseError' | 'ReadError';

export interface Finding {
    readonly key: string;
    readonly kind: FindingKind;
    readonly message: string;
}

export interface FileResult {
    readonly path: string;
    readonly ok: boolean;
    readonly findings: readonly Finding[];
}

export interface ValidationRun {
    readonly results: readonly FileResult[];
    readonly ok: boolean;
}

/**
 * A flat i18next catalog: translation key -> translation text.
 */
export interface TranslationCatalog {
    [key: string]: string;
}

export function createFinding(key: string, kind: FindingKind, message: string): Finding {
    return Object.freeze({ key, kind, message });
}
