/**
 * Decides which candidate files count as translation files.
 * Works on path strings only; nothing here touches the filesystem.
 */

/** Splits on both separators and drops empty and "." components. */
export function pathComponents(value: string): string[] {
    return value.split(/[\\/]+/).filter((part) => part !== '' && part !== '.');
}

export function isJsonFile(filePath: string): boolean {
    return filePath.toLowerCase().endsWith('.json');
}

function containsSequence(haystack: string[], needle: string[]): boolean {
    if (needle.length === 0 || needle.length > haystack.length) return false;

    for (let start = 0; start + needle.length <= haystack.length; start++) {
        let matched = true;
        for (let i = 0; i < needle.length; i++) {
            if (haystack[start + i] !== needle[i]) {
                matched = false;
                break;
            }
        }
        if (matched) return true;
    }
    return false;
}

/**
 * True if the file lives under one of the translation directories.
 *
 * A directory matches when its components appear, in order and whole, among the
 * directory components of the file path (the last component is the file name):
 * "translations/" matches "app/translations/en/common.json" but neither
 * "my_translations/en.json" nor "config/translations.json".
 * An empty directory list accepts every file.
 */
export function shouldProcessFile(filePath: string, translationDirs: readonly string[]): boolean {
    if (translationDirs.length === 0) {
        return true;
    }

    const directories = pathComponents(filePath).slice(0, -1);

    return translationDirs.some((dir) => containsSequence(directories, pathComponents(dir)));
}
