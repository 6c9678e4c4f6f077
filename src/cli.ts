import * as path from 'path';
import fg from 'fast-glob';
import cliProgress from 'cli-progress';
import { ConfigError, loadConfig } from './config.js';
import { formatReport } from './report.js';
import { validateFiles, type SkipReason } from './validator.js';

export const PASS = 0;
export const FAIL = 1;
export const USAGE_ERROR = 2;

export const USAGE = `
Usage: validate-i18n [options] [files...]

Validates i18next translation JSON files for common issues:
  1. Empty translation values ("key": "")
  2. Plural suffixes at the end of values ("count": "{{count}} items_one")

Only .json files are checked. Exits with code 1 if any file fails.

Options:
  --translation-dirs <dir...>  Only check files inside these directories
                               (values run until the next option or "--")
  --translation-dirs=a,b       Same, as a comma-separated list
  --translation-dir <dir>      Add one translation directory (repeatable)
  --all                        Also check every *.json file found under --root
  --root=<dir>                 Directory scanned by --all (default: .)
  --verbose                    Log skipped files and a summary
  --progress                   Show a progress bar on stderr
  -h, --help                   Show this message

Environment:
  I18N_TRANSLATION_DIRS        Default translation directories (comma-separated)
  I18N_VALIDATOR_VERBOSE       true to enable --verbose

Examples:
  validate-i18n --translation-dirs=locales/ locales/en/common.json
  validate-i18n --all --translation-dirs public/i18n/
`;

const DISCOVERY_IGNORE = ['**/node_modules/**', '**/.git/**', '**/dist/**'];

const SKIP_REASONS: Record<SkipReason, string> = {
    extension: 'not a .json file',
    directory: 'outside translation directories',
};

export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

export interface CliOptions {
    filenames: string[];
    translationDirs: string[];
    all: boolean;
    root: string;
    verbose: boolean;
    progress: boolean;
    help: boolean;
}

function splitDirList(value: string, option: string): string[] {
    const dirs = value.split(',').map(dir => dir.trim()).filter(dir => dir.length > 0);
    if (dirs.length === 0) {
        throw new UsageError(`${option} expects at least one directory`);
    }
    return dirs;
}

export function parseArgs(argv: readonly string[]): CliOptions {
    const options: CliOptions = {
        filenames: [],
        translationDirs: [],
        all: false,
        root: '.',
        verbose: false,
        progress: false,
        help: false,
    };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];

        if (arg === '--') {
            options.filenames.push(...argv.slice(i + 1));
            break;
        }

        if (arg === '--help' || arg === '-h') {
            options.help = true;
        } else if (arg === '--all') {
            options.all = true;
        } else if (arg === '--verbose') {
            options.verbose = true;
        } else if (arg === '--progress') {
            options.progress = true;
        } else if (arg.startsWith('--root=')) {
            options.root = arg.slice('--root='.length);
            if (!options.root) throw new UsageError('--root expects a directory');
        } else if (arg === '--root') {
            const value = argv[i + 1];
            if (value === undefined || value.startsWith('-')) {
                throw new UsageError('--root expects a directory');
            }
            options.root = value;
            i++;
        } else if (arg.startsWith('--translation-dirs=')) {
            options.translationDirs.push(...splitDirList(arg.slice('--translation-dirs='.length), '--translation-dirs'));
        } else if (arg === '--translation-dirs') {
            const start = i + 1;
            let end = start;
            while (end < argv.length && !argv[end].startsWith('--')) {
                end++;
            }
            if (end === start) {
                throw new UsageError('--translation-dirs expects at least one directory');
            }
            options.translationDirs.push(...argv.slice(start, end));
            i = end - 1;
        } else if (arg.startsWith('--translation-dir=')) {
            options.translationDirs.push(...splitDirList(arg.slice('--translation-dir='.length), '--translation-dir'));
        } else if (arg === '--translation-dir') {
            const value = argv[i + 1];
            if (value === undefined || value.startsWith('--')) {
                throw new UsageError('--translation-dir expects a directory');
            }
            options.translationDirs.push(value);
            i++;
        } else if (arg.startsWith('-') && arg !== '-') {
            throw new UsageError(`Unknown option: ${arg}`);
        } else {
            options.filenames.push(arg);
        }
    }

    return options;
}

/**
 * Every *.json file under root (case-insensitive extension), sorted, as paths joined onto root.
 */
export async function discoverTranslationFiles(root: string): Promise<string[]> {
    const files = await fg('**/*.json', {
        cwd: root,
        ignore: DISCOVERY_IGNORE,
        caseSensitiveMatch: false,
        onlyFiles: true,
    });
    return files.sort().map(file => path.join(root, file));
}

function mergeUnique(explicit: readonly string[], discovered: readonly string[]): string[] {
    const seen = new Set<string>();
    const merged: string[] = [];
    for (const file of [...explicit, ...discovered]) {
        const key = path.normalize(file);
        if (seen.has(key)) continue;
        seen.add(key);
        merged.push(file);
    }
    return merged;
}

/**
 * Entry point for the validate-i18n CLI. Resolves to the process exit code.
 */
export async function main(
    argv: readonly string[] = process.argv.slice(2),
    env: NodeJS.ProcessEnv = process.env
): Promise<number> {
    let options: CliOptions;
    let translationDirs: string[];
    let verbose: boolean;
    try {
        options = parseArgs(argv);
        const config = loadConfig(env);
        translationDirs = options.translationDirs.length > 0 ? options.translationDirs : config.translationDirs;
        verbose = options.verbose || config.verbose;
    } catch (err) {
        if (err instanceof UsageError || err instanceof ConfigError) {
            console.error(`Error: ${err.message}`);
            console.error(USAGE.trim());
            return USAGE_ERROR;
        }
        throw err;
    }

    if (options.help) {
        console.log(USAGE.trim());
        return PASS;
    }

    let filenames = options.filenames;
    if (options.all) {
        const discovered = await discoverTranslationFiles(options.root);
        if (verbose) {
            console.log(`Found ${discovered.length} JSON files under ${options.root}`);
        }
        filenames = mergeUnique(filenames, discovered);
    }

    if (filenames.length === 0) {
        if (verbose) console.log('No files to check.');
        return PASS;
    }

    const bar = options.progress
        ? new cliProgress.SingleBar(
            { format: 'Validating [{bar}] {value}/{total} files', clearOnComplete: true },
            cliProgress.Presets.shades_classic
        )
        : null;
    bar?.start(filenames.length, 0);

    const skipped: string[] = [];
    const run = validateFiles(filenames, {
        translationDirs,
        onResult: () => bar?.increment(),
        onSkip: (filePath, reason) => {
            bar?.increment();
            skipped.push(`  Skipped ${filePath} (${SKIP_REASONS[reason]})`);
        },
    });
    bar?.stop();

    if (verbose) {
        for (const line of skipped) console.log(line);
    }

    for (const line of formatReport(run.results)) {
        console.log(line);
    }

    if (verbose) {
        const failed = run.results.filter(result => !result.ok).length;
        if (failed > 0) {
            console.log(`❌ ${failed} of ${run.results.length} file(s) failed validation`);
        } else {
            console.log(`✅ All ${run.results.length} file(s) passed validation`);
        }
    }

    return run.ok ? PASS : FAIL;
}
