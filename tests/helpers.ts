import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

export function createTempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), 'i18n-validator-'));
}

export function removeTempDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}

/** Writes content as pretty-printed JSON (or raw text for strings) and returns the full path. */
export function writeTranslationFile(dir: string, relativePath: string, content: unknown): string {
    const fullPath = path.join(dir, relativePath);
    fs.mkdirSync(path.dirname(fullPath), { recursive: true });
    const text = typeof content === 'string' ? content : JSON.stringify(content, null, 2);
    fs.writeFileSync(fullPath, text, 'utf-8');
    return fullPath;
}
