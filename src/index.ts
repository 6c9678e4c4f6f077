export { findEmptyTranslations, findPluralSuffixInValues, findTerminalPluralSuffix } from './rules.js';
export { validateTranslationFile, validateFiles, loadTranslationFile } from './validator.js';
export type { LoadOutcome, ReadFailure, SkipReason, ValidateFilesOptions } from './validator.js';
export { shouldProcessFile, isJsonFile, pathComponents } from './path-filter.js';
export { toJsonDocument, catalogEntries, parseJsonText, locateOffset, describeParseError } from './json-document.js';
export type { JsonDocument, ParseFailure, ParseOutcome } from './json-document.js';
export { formatFinding, formatReport, FINDING_LABELS } from './report.js';
export { loadConfig, loadDotenv, ConfigError } from './config.js';
export type { ValidatorConfig } from './config.js';
export { main, parseArgs, discoverTranslationFiles, UsageError, PASS, FAIL, USAGE_ERROR } from './cli.js';
export type { CliOptions } from './cli.js';
export { PLURAL_CATEGORIES, PLURAL_SUFFIXES, FILE_KEY, createFinding } from './utils.js';
export type {
    Finding,
    FindingKind,
    FileResult,
    ValidationRun,
    TranslationCatalog,
    PluralCategory,
    PluralSuffix,
} from './utils.js';
