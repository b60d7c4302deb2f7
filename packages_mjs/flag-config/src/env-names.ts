/**
 * Environment variable naming.
 * Derives variable names from flag names and detects flags that would share one.
 */

import { AmbiguousNameError } from './errors.js';
import { Flag, describeFlag } from './flag.js';

export interface EnvNaming {
    prefix: string;
    caseSensitive: boolean;
    /** Also derive a name from each flag's short name. */
    shortNames: boolean;
}

/** Environment variable key to every flag that derives it, in walk order. */
export type EnvIndex = Map<string, Flag[]>;

const SEPARATORS = /[-./]/g;

/**
 * envVarKey('dry-run', { prefix: 'app', ... }) === 'APP_DRY_RUN'
 */
export function envVarKey(flagName: string, naming: EnvNaming): string {
    const key = flagName.replace(/^-+/, '').replace(SEPARATORS, '_');
    if (naming.caseSensitive) {
        return withPrefix(key, naming.prefix);
    }
    return withPrefix(key, naming.prefix.toUpperCase()).toUpperCase();
}

/**
 * Candidate keys for a flag: long name first, then short name when enabled.
 */
export function envVarKeys(flag: Flag, naming: EnvNaming): string[] {
    const keys: string[] = [];
    const longName = flag.getLongName();
    const shortName = flag.getShortName();
    if (longName !== undefined) {
        keys.push(envVarKey(longName, naming));
    }
    if (shortName !== undefined && naming.shortNames) {
        keys.push(envVarKey(shortName, naming));
    }
    return keys;
}

export function buildEnvIndex(flags: readonly Flag[], naming: EnvNaming): EnvIndex {
    const index: EnvIndex = new Map();
    for (const flag of flags) {
        for (const key of envVarKeys(flag, naming)) {
            const bucket = index.get(key) ?? [];
            if (!bucket.includes(flag)) {
                bucket.push(flag);
            }
            index.set(key, bucket);
        }
    }
    return index;
}

/**
 * Throws AmbiguousNameError for the first key derived by more than one flag.
 */
export function assertUnambiguous(index: EnvIndex): void {
    for (const [key, flags] of index) {
        if (flags.length > 1) {
            throw new AmbiguousNameError(key, flags.map(describeFlag));
        }
    }
}

/**
 * Splits on separator. A separator preceded by a backslash is kept literally.
 */
export function splitEscape(input: string, separator: string): string[] {
    const escape = '\\';
    const tokens = input.split(separator);
    for (let i = tokens.length - 2; i >= 0; i--) {
        if (tokens[i].endsWith(escape)) {
            tokens[i] = tokens[i].slice(0, -escape.length) + separator + tokens[i + 1];
            tokens.splice(i + 1, 1);
        }
    }
    return tokens;
}

function withPrefix(key: string, prefix: string): string {
    return prefix ? `${prefix}_${key}` : key;
}
