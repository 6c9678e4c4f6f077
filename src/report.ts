import type { FileResult, Finding, FindingKind } from './utils.js';

export const FINDING_LABELS: Record<FindingKind, string> = {
    EmptyValue: 'Empty translation',
    MisplacedPluralSuffix: 'Plural suffix in value',
    ParseError: 'JSON Parse Error',
    ReadError: 'Error',
};

export function formatFinding(finding: Finding): string {
    return `  - ${FINDING_LABELS[finding.kind]}: "${finding.key}" - ${finding.message}`;
}

/**
 * Report lines for the failing files: path, one line per finding, blank separator.
 * Empty when every file passed.
 */
export function formatReport(results: readonly FileResult[]): string[] {
    const failed = results.filter((result) => !result.ok);
    if (failed.length === 0) return [];

    const lines = [''];
    for (const result of failed) {
        lines.push(`${result.path}:`);
        lines.push(...result.findings.map(formatFinding));
        lines.push('');
    }
    return lines;
}
