/**
 * Parse boundary for translation files.
 * Decoded JSON is classified into a tagged document so the rules only ever act
 * on the mapping case; arrays and scalars at the root simply carry no entries.
 * A root object is decoded into a Map so its keys keep document order
 * (plain objects list integer-like keys such as "404" first).
 */

import { getNodeValue, parseTree, printParseErrorCode, type Node, type ParseError } from 'jsonc-parser';

export type JsonDocument =
    | { kind: 'mapping'; entries: Array<[string, unknown]> }
    | { kind: 'sequence'; items: unknown[] }
    | { kind: 'string'; value: string }
    | { kind: 'number'; value: number }
    | { kind: 'bool'; value: boolean }
    | { kind: 'null' };

export interface ParseFailure {
    reason: 'parse';
    message: string;
    line: number;
    column: number;
}

export type ParseOutcome =
    | { ok: true; value: unknown }
    | { ok: false; failure: ParseFailure };

export interface JsonErrorLocation {
    line: number;
    column: number;
}

const BOM = '\uFEFF';

const STRICT_JSON = {
    disallowComments: true,
    allowTrailingComma: false,
    allowEmptyContent: false,
};

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function toJsonDocument(value: unknown): JsonDocument {
    if (Array.isArray(value)) return { kind: 'sequence', items: value };
    if (value instanceof Map) {
        return { kind: 'mapping', entries: [...value].map(([key, item]): [string, unknown] => [String(key), item]) };
    }
    if (isRecord(value)) return { kind: 'mapping', entries: Object.entries(value) };
    if (typeof value === 'string') return { kind: 'string', value };
    if (typeof value === 'number') return { kind: 'number', value };
    if (typeof value === 'boolean') return { kind: 'bool', value };
    // null, and anything JSON cannot express (undefined, functions, bigint)
    return { kind: 'null' };
}

/**
 * Entries of a mapping document in iteration order; empty for every other kind.
 */
export function catalogEntries(data: unknown): Array<[string, unknown]> {
    const document = toJsonDocument(data);
    return document.kind === 'mapping' ? document.entries : [];
}

/** 1-based line/column of a character offset. */
export function locateOffset(text: string, offset: number): JsonErrorLocation {
    const before = text.slice(0, Math.min(offset, text.length));
    const lineStart = before.lastIndexOf('\n') + 1;
    return {
        line: before.split('\n').length,
        column: before.length - lineStart + 1,
    };
}

/** "PropertyNameExpected" -> "Property name expected" */
export function describeParseError(error: ParseError): string {
    const words = printParseErrorCode(error.error).replace(/([a-z])([A-Z])/g, '$1 $2').toLowerCase();
    return words.charAt(0).toUpperCase() + words.slice(1);
}

/**
 * Duplicate keys keep their first position and take the last value.
 */
function objectNodeToMap(node: Node): Map<string, unknown> {
    const mapping = new Map<string, unknown>();
    for (const property of node.children ?? []) {
        const [keyNode, valueNode] = property.children ?? [];
        if (!keyNode || !valueNode) continue;
        mapping.set(String(keyNode.value), getNodeValue(valueNode));
    }
    return mapping;
}

export function parseJsonText(text: string): ParseOutcome {
    const source = text.startsWith(BOM) ? text.slice(BOM.length) : text;

    const errors: ParseError[] = [];
    const root = parseTree(source, errors, STRICT_JSON);

    const [firstError] = errors;
    if (firstError) {
        return {
            ok: false,
            failure: {
                reason: 'parse',
                message: describeParseError(firstError),
                ...locateOffset(source, firstError.offset),
            },
        };
    }

    if (!root) {
        return { ok: true, value: null };
    }
    return { ok: true, value: root.type === 'object' ? objectNodeToMap(root) : getNodeValue(root) };
}
