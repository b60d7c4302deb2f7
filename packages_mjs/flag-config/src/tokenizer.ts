/**
 * Argument tokenizer.
 * Applies command-line tokens to flags and returns the positional leftovers.
 */

import { Flag, describeFlag } from './flag.js';
import { HelpRequestedError, MissingValueError, UnknownFlagError } from './errors.js';
import { getLogger } from './logger.js';

const logger = getLogger('args');

export type Token =
    | { kind: 'long'; name: string; value: string | undefined }
    | { kind: 'short'; body: string }
    | { kind: 'terminator' }
    | { kind: 'positional' };

/**
 * Flags the tokenizer is allowed to set.
 */
export interface FlagLookup {
    findLong(name: string): Flag | undefined;
    findShort(name: string): Flag | undefined;
}

export function classifyToken(arg: string): Token {
    if (arg === '--') {
        return { kind: 'terminator' };
    }
    if (arg.startsWith('--')) {
        const body = arg.slice(2);
        const eq = body.indexOf('=');
        if (eq < 0) {
            return { kind: 'long', name: body, value: undefined };
        }
        return { kind: 'long', name: body.slice(0, eq), value: body.slice(eq + 1) };
    }
    if (arg.startsWith('-') && arg.length > 1) {
        return { kind: 'short', body: arg.slice(1) };
    }
    return { kind: 'positional' };
}

/**
 * Applies args left to right and returns everything from the first positional
 * token on. Tokens after `--` are positional whatever their shape.
 */
export function applyArgs(lookup: FlagLookup, args: readonly string[]): string[] {
    let i = 0;

    while (i < args.length) {
        const token = classifyToken(args[i]);

        switch (token.kind) {
            case 'terminator':
                return args.slice(i + 1);

            case 'positional':
                return args.slice(i);

            case 'long':
                i = applyLong(lookup, token.name, token.value, args, i);
                break;

            case 'short':
                i = applyShort(lookup, token.body, args, i);
                break;
        }
    }

    return [];
}

/**
 * Returns the index of the next unconsumed token.
 */
function applyLong(
    lookup: FlagLookup,
    name: string,
    value: string | undefined,
    args: readonly string[],
    index: number
): number {
    const flag = lookup.findLong(name);
    if (!flag) {
        if (name.toLowerCase() === 'help') {
            throw new HelpRequestedError();
        }
        throw new UnknownFlagError(`--${name}`);
    }

    if (value !== undefined) {
        apply(flag, value);
        return index + 1;
    }

    if (flag.isBoolFlag()) {
        apply(flag, 'true');
        return index + 1;
    }

    if (index + 1 >= args.length) {
        throw new MissingValueError(describeFlag(flag));
    }
    apply(flag, args[index + 1]);
    return index + 2;
}

function applyShort(lookup: FlagLookup, body: string, args: readonly string[], index: number): number {
    const chars = [...body];

    for (let j = 0; j < chars.length; j++) {
        const name = chars[j];
        const flag = lookup.findShort(name);
        if (!flag) {
            if (name === 'h') {
                throw new HelpRequestedError();
            }
            throw new UnknownFlagError(`-${name}`);
        }

        const rest = chars.slice(j + 1).join('');

        // -x=value
        if (rest.startsWith('=')) {
            apply(flag, rest.slice(1));
            return index + 1;
        }

        if (flag.isBoolFlag()) {
            apply(flag, 'true');
            continue;
        }

        // -n5
        if (rest !== '') {
            apply(flag, rest);
            return index + 1;
        }

        if (index + 1 >= args.length) {
            throw new MissingValueError(describeFlag(flag));
        }
        apply(flag, args[index + 1]);
        return index + 2;
    }

    return index + 1;
}

function apply(flag: Flag, value: string): void {
    logger.assigned('trace', describeFlag(flag), value);
    flag.setValue(value);
}
