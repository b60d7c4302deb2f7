/**
 * Nested document flattening.
 * Turns a decoded config document into name/value pairs for a ConfigSetter.
 */

import { ConfigParseError, StringConversionError } from './errors.js';
import { ConfigSetter } from './options.js';

export interface FlattenOptions {
    /** Joins nested mapping keys into a flag name. Default ".". */
    delimiter?: string;
}

/**
 * Walks a mapping and calls set once per scalar, in document order.
 *
 * - a mapping under path P recurses with P + delimiter + key
 * - a sequence under P calls set(P, ...) once per element
 * - a null value under P calls set(P, '')
 *
 * A null or undefined document sets nothing.
 */
export function flattenDocument(doc: unknown, set: ConfigSetter, options: FlattenOptions = {}): void {
    const delimiter = options.delimiter ?? '.';

    if (doc === null || doc === undefined) {
        return;
    }
    if (!isMapping(doc)) {
        throw new ConfigParseError(`config document must be a mapping, got ${Array.isArray(doc) ? 'sequence' : typeof doc}`);
    }

    for (const [key, child] of Object.entries(doc)) {
        visit(child, key, delimiter, set);
    }
}

export function stringifyScalar(value: unknown): string {
    switch (typeof value) {
        case 'string':
            return value;
        case 'boolean':
            return value ? 'true' : 'false';
        case 'bigint':
            return value.toString(10);
        case 'number':
            // BigInt keeps large integers out of exponent notation
            return Number.isInteger(value) ? BigInt(value).toString(10) : String(value);
        default:
            throw new StringConversionError(value);
    }
}

function visit(node: unknown, path: string, delimiter: string, set: ConfigSetter): void {
    if (isMapping(node)) {
        for (const [key, child] of Object.entries(node)) {
            visit(child, `${path}${delimiter}${key}`, delimiter, set);
        }
        return;
    }

    if (Array.isArray(node)) {
        for (const element of node) {
            visit(element, path, delimiter, set);
        }
        return;
    }

    if (node === null || node === undefined) {
        set(path, '');
        return;
    }

    set(path, stringifyScalar(node));
}

function isMapping(node: unknown): node is Record<string, unknown> {
    if (typeof node !== 'object' || node === null || Array.isArray(node)) {
        return false;
    }
    const proto: unknown = Object.getPrototypeOf(node);
    return proto === Object.prototype || proto === null;
}
