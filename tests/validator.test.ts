import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { loadTranslationFile, validateFiles, validateTranslationFile, type SkipReason } from '../src/validator.js';
import type { FileResult } from '../src/utils.js';
import { createTempDir, removeTempDir, writeTranslationFile } from './helpers.js';

describe('validateTranslationFile', () => {
    let tmpDir: string;

    beforeEach(() => {
        tmpDir = createTempDir();
    });

    afterEach(() => {
        removeTempDir(tmpDir);
    });

    it('passes a valid catalog', () => {
        const file = writeTranslationFile(tmpDir, 'valid.json', { hello: 'Hello', goodbye: 'Goodbye' });

        expect(validateTranslationFile(file)).toEqual({ path: file, ok: true, findings: [] });
    });

    it('reports empty values', () => {
        const file = writeTranslationFile(tmpDir, 'empty.json', {
            welcome: '',
            hello: 'Hello',
            goodbye: '',
            thanks: 'Thank you',
        });

        const result = validateTranslationFile(file);

        expect(result.ok).toBe(false);
        expect(result.findings.map(f => f.key)).toEqual(['welcome', 'goodbye']);
    });

    it('runs the empty-value rule before the plural-suffix rule', () => {
        const file = writeTranslationFile(tmpDir, 'mixed.json', {
            empty: '',
            plural_error: '{{count}} items_one',
            another_empty: '',
            valid: 'Valid translation',
        });

        const result = validateTranslationFile(file);

        expect(result.findings).toEqual([
            { key: 'empty', kind: 'EmptyValue', message: 'translation value is an empty string' },
            { key: 'another_empty', kind: 'EmptyValue', message: 'translation value is an empty string' },
            {
                key: 'plural_error',
                kind: 'MisplacedPluralSuffix',
                message: 'contains "_one" (should be in key, not value)',
            },
        ]);
    });

    it('turns a missing file into a read error', () => {
        const file = path.join(tmpDir, 'does_not_exist.json');

        const result = validateTranslationFile(file);

        expect(result.ok).toBe(false);
        expect(result.findings).toHaveLength(1);
        expect(result.findings[0].key).toBe('FILE');
        expect(result.findings[0].kind).toBe('ReadError');
        expect(result.findings[0].message).toMatch(/^Failed to read file: ENOENT: no such file or directory/);
    });

    it('turns a directory into a read error', () => {
        const dir = path.join(tmpDir, 'folder.json');
        fs.mkdirSync(dir);

        const result = validateTranslationFile(dir);

        expect(result.findings).toHaveLength(1);
        expect(result.findings[0].kind).toBe('ReadError');
        expect(result.findings[0].message).toContain('EISDIR');
    });

    it('turns invalid UTF-8 into a read error', () => {
        const file = path.join(tmpDir, 'latin1.json');
        // {"a":"<0xE9>t<0xE9>"} in ISO-8859-1
        fs.writeFileSync(file, Buffer.from([0x7b, 0x22, 0x61, 0x22, 0x3a, 0x22, 0xe9, 0x74, 0xe9, 0x22, 0x7d]));

        const result = validateTranslationFile(file);

        expect(result.findings).toHaveLength(1);
        expect(result.findings[0].kind).toBe('ReadError');
        expect(result.findings[0].message).toMatch(/^Failed to read file: file is not valid UTF-8 \(detected .+\)$/);
    });

    it('turns malformed JSON into a single parse error', () => {
        const file = writeTranslationFile(tmpDir, 'broken.json', '{"hello": "", "bye": ');

        const result = validateTranslationFile(file);

        expect(result.ok).toBe(false);
        expect(result.findings).toHaveLength(1);
        expect(result.findings[0].key).toBe('FILE');
        expect(result.findings[0].kind).toBe('ParseError');
        expect(result.findings[0].message).toBe('Invalid JSON: Value expected at line 1, column 22');
    });

    it('reports unknown tokens on a single line with their location', () => {
        const file = writeTranslationFile(tmpDir, 'typo.json', '{\n "a": tru\n}');

        const result = validateTranslationFile(file);

        expect(result.findings).toEqual([
            { key: 'FILE', kind: 'ParseError', message: 'Invalid JSON: Invalid symbol at line 2, column 7' },
        ]);
    });

    it('locates a trailing comma', () => {
        const file = writeTranslationFile(tmpDir, 'trailing-comma.json', '{\n  "a": "b",\n}');

        const result = validateTranslationFile(file);

        expect(result.findings[0].kind).toBe('ParseError');
        expect(result.findings[0].message).toBe('Invalid JSON: Property name expected at line 3, column 1');
    });

    it('reports findings in document order for integer-like keys', () => {
        const file = writeTranslationFile(tmpDir, 'errors.json', '{"title": "", "404": "", "500": "Server error_other"}');

        const result = validateTranslationFile(file);

        expect(result.findings.map(f => [f.kind, f.key])).toEqual([
            ['EmptyValue', 'title'],
            ['EmptyValue', '404'],
            ['MisplacedPluralSuffix', '500'],
        ]);
    });

    it('accepts documents that are not objects', () => {
        for (const content of ['["", "items_one"]', '"_one"', '""', 'null', '42', 'true']) {
            const file = writeTranslationFile(tmpDir, 'scalar.json', content);
            expect(validateTranslationFile(file)).toEqual({ path: file, ok: true, findings: [] });
        }
    });

    it('accepts a UTF-8 byte-order mark', () => {
        const file = writeTranslationFile(tmpDir, 'bom.json', '\uFEFF{"hello": ""}');

        const result = validateTranslationFile(file);

        expect(result.findings.map(f => f.kind)).toEqual(['EmptyValue']);
    });

    it('gives the same result when run twice', () => {
        const file = writeTranslationFile(tmpDir, 'errors.json', { welcome: '', count: '{{count}} items_one' });

        expect(validateTranslationFile(file)).toEqual(validateTranslationFile(file));
    });
});

describe('loadTranslationFile', () => {
    let tmpDir: string;

    beforeEach(() => {
        tmpDir = createTempDir();
    });

    afterEach(() => {
        removeTempDir(tmpDir);
    });

    it('returns the parsed value', () => {
        const file = writeTranslationFile(tmpDir, 'en.json', { hello: 'Привет' });
        expect(loadTranslationFile(file)).toEqual({ ok: true, value: new Map([['hello', 'Привет']]) });
    });

    it('separates read failures from parse failures', () => {
        const broken = writeTranslationFile(tmpDir, 'broken.json', '{');
        const missing = path.join(tmpDir, 'missing.json');

        const parsed = loadTranslationFile(broken);
        const read = loadTranslationFile(missing);

        expect(parsed.ok ? null : parsed.failure.reason).toBe('parse');
        expect(read.ok ? null : read.failure.reason).toBe('read');
    });
});

describe('validateFiles', () => {
    let tmpDir: string;

    beforeEach(() => {
        tmpDir = createTempDir();
    });

    afterEach(() => {
        removeTempDir(tmpDir);
    });

    it('passes with no files', () => {
        expect(validateFiles([])).toEqual({ results: [], ok: true });
    });

    it('reports every tenth file of fifty as failing', () => {
        const files: string[] = [];
        for (let i = 0; i < 50; i++) {
            files.push(writeTranslationFile(tmpDir, `file_${i}.json`, i % 10 === 0 ? { key: '' } : { key: 'value' }));
        }

        const run = validateFiles(files);

        expect(run.ok).toBe(false);
        expect(run.results).toHaveLength(50);
        const failing = run.results.filter(r => !r.ok).map(r => r.path);
        expect(failing).toEqual([0, 10, 20, 30, 40].map(i => path.join(tmpDir, `file_${i}.json`)));
    });

    it('keeps going after a broken file', () => {
        const missing = path.join(tmpDir, 'missing.json');
        const broken = writeTranslationFile(tmpDir, 'broken.json', 'not json');
        const valid = writeTranslationFile(tmpDir, 'valid.json', { hello: 'Hello' });

        const run = validateFiles([missing, broken, valid]);

        expect(run.results.map(r => [r.path, r.ok])).toEqual([
            [missing, false],
            [broken, false],
            [valid, true],
        ]);
        expect(run.ok).toBe(false);
    });

    it('skips non-JSON files and files outside the translation directories', () => {
        const inScope = writeTranslationFile(tmpDir, 'translations/en.json', { hello: '' });
        const outside = writeTranslationFile(tmpDir, 'config/settings.json', { hello: '' });
        const text = writeTranslationFile(tmpDir, 'translations/notes.txt', '{"hello": ""}');
        const upper = writeTranslationFile(tmpDir, 'translations/DE.JSON', { hello: 'Hallo' });

        const skipped: Array<[string, SkipReason]> = [];
        const seen: FileResult[] = [];
        const run = validateFiles([inScope, outside, text, upper], {
            translationDirs: ['translations/'],
            onSkip: (filePath, reason) => skipped.push([filePath, reason]),
            onResult: result => seen.push(result),
        });

        expect(run.results.map(r => r.path)).toEqual([inScope, upper]);
        expect(seen).toEqual(run.results);
        expect(skipped).toEqual([
            [outside, 'directory'],
            [text, 'extension'],
        ]);
        expect(run.ok).toBe(false);
    });

    it('passes when every in-scope file is valid', () => {
        const files = [
            writeTranslationFile(tmpDir, 'file1.json', { hello: 'Hello' }),
            writeTranslationFile(tmpDir, 'file2.json', { bye: 'Goodbye' }),
            writeTranslationFile(tmpDir, 'file3.json', { thanks: 'Thanks' }),
        ];

        const run = validateFiles(files);

        expect(run.ok).toBe(true);
        expect(run.results).toHaveLength(3);
    });
});
