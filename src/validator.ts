import * as fs from 'fs';
import * as jschardet from 'jschardet';
import { parseJsonText, type ParseFailure } from './json-document.js';
import { isJsonFile, shouldProcessFile } from './path-filter.js';
import { findEmptyTranslations, findPluralSuffixInValues } from './rules.js';
import { FILE_KEY, type FileResult, type Finding, type ValidationRun, createFinding } from './utils.js';

export interface ReadFailure {
    reason: 'read';
    message: string;
}

export type LoadOutcome =
    | { ok: true; value: unknown }
    | { ok: false; failure: ParseFailure | ReadFailure };

export type SkipReason = 'extension' | 'directory';

export interface ValidateFilesOptions {
    translationDirs?: readonly string[];
    onResult?: (result: FileResult) => void;
    onSkip?: (filePath: string, reason: SkipReason) => void;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
    return err instanceof Error && 'code' in err && typeof err.code === 'string';
}

function decodeUtf8(buffer: Buffer): { ok: true; text: string } | { ok: false; error: string } {
    try {
        return { ok: true, text: utf8.decode(buffer) };
    } catch (err) {
        if (!(err instanceof TypeError)) throw err;

        const detected = jschardet.detect(buffer);
        const encoding = detected.encoding ? detected.encoding : 'unknown encoding';
        return { ok: false, error: `file is not valid UTF-8 (detected ${encoding})` };
    }
}

/**
 * Reads, decodes and parses one file. Filesystem, decoding and syntax failures
 * come back as data; any other exception is a bug and propagates.
 */
export function loadTranslationFile(filePath: string): LoadOutcome {
    let buffer: Buffer;
    try {
        buffer = fs.readFileSync(filePath);
    } catch (err) {
        if (!isErrnoException(err)) throw err;
        return { ok: false, failure: { reason: 'read', message: err.message } };
    }

    const decoded = decodeUtf8(buffer);
    if (!decoded.ok) {
        return { ok: false, failure: { reason: 'read', message: decoded.error } };
    }

    return parseJsonText(decoded.text);
}

function failureToFinding(failure: ParseFailure | ReadFailure): Finding {
    if (failure.reason === 'read') {
        return createFinding(FILE_KEY, 'ReadError', `Failed to read file: ${failure.message}`);
    }

    return createFinding(
        FILE_KEY,
        'ParseError',
        `Invalid JSON: ${failure.message} at line ${failure.line}, column ${failure.column}`
    );
}

/**
 * Validates a single translation JSON file.
 * Always returns a result: a broken file yields one FILE-level finding.
 */
export function validateTranslationFile(filePath: string): FileResult {
    const loaded = loadTranslationFile(filePath);

    const findings: Finding[] = loaded.ok
        ? [
            ...findEmptyTranslations(loaded.value),
            ...findPluralSuffixInValues(loaded.value),
        ]
        : [failureToFinding(loaded.failure)];

    return { path: filePath, ok: findings.length === 0, findings };
}

/**
 * Validates every in-scope file, in input order.
 * Non-JSON files and files outside the translation directories are skipped.
 */
export function validateFiles(filePaths: readonly string[], options: ValidateFilesOptions = {}): ValidationRun {
    const translationDirs = options.translationDirs ?? [];
    const results: FileResult[] = [];

    for (const filePath of filePaths) {
        if (!isJsonFile(filePath)) {
            options.onSkip?.(filePath, 'extension');
            continue;
        }
        if (!shouldProcessFile(filePath, translationDirs)) {
            options.onSkip?.(filePath, 'directory');
            continue;
        }

        const result = validateTranslationFile(filePath);
        results.push(result);
        options.onResult?.(result);
    }

    return { results, ok: results.every((result) => result.ok) };
}
