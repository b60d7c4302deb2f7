/**
 * Layered parse: args, then environment, then config file, then defaults.
 */

import {
    AmbiguousNameError,
    ConfigFileMissingError,
    ConfigParseError,
    ParseValueError,
    StringConversionError,
    UnknownFlagError
} from './errors.js';
import { EnvIndex, assertUnambiguous, buildEnvIndex, envVarKeys, splitEscape } from './env-names.js';
import { Flag, describeFlag } from './flag.js';
import { FlagSet } from './flag-set.js';
import { getLogger } from './logger.js';
import { ConfigSetter, ParseOptions, ResolvedOptions, resolveOptions } from './options.js';

const envLogger = getLogger('env');
const configLogger = getLogger('config');

/**
 * Parses args into flagSet, then fills flags that are still unset from the
 * env snapshot and then from the config file. Returns the leftover args.
 *
 * A flag set by a higher-priority source is never touched by a lower one.
 * Nothing is rolled back on failure.
 */
export function parse(flagSet: FlagSet, args: readonly string[], options: ParseOptions = {}): string[] {
    // 1. Options and the env key index, checked before anything is applied
    const resolved = resolveOptions(options);
    const flags = flagSet.getAllFlags();
    const index = buildEnvIndex(flags, resolved.naming);
    if (resolved.envEnabled) {
        assertUnambiguous(index);
    }

    // 2. Command line
    flagSet.parse(args);

    // 3. Environment
    if (resolved.envEnabled) {
        applyEnv(flags, resolved, snapshotProvided(flags));
    }

    // 4. Config file
    applyConfigFile(flagSet, index, resolved, snapshotProvided(flags));

    return flagSet.getArgs();
}

function snapshotProvided(flags: readonly Flag[]): Set<Flag> {
    return new Set(flags.filter(f => f.isSet()));
}

function applyEnv(flags: readonly Flag[], options: ResolvedOptions, provided: Set<Flag>): void {
    const env = new Map<string, string>();
    for (const [name, value] of options.env) {
        const key = options.naming.caseSensitive ? name : name.toUpperCase();
        if (!env.has(key)) {
            env.set(key, value);
        }
    }

    for (const flag of flags) {
        if (provided.has(flag)) {
            continue;
        }

        const key = envVarKeys(flag, options.naming).find(k => env.has(k));
        const value = key === undefined ? undefined : env.get(key);
        if (key === undefined || value === undefined) {
            continue;
        }

        const values = options.envSplit ? splitEscape(value, options.envSplit) : [value];
        envLogger.assigned('debug', key, value, describeFlag(flag));
        for (const v of values) {
            flag.setValue(v);
        }
    }
}

function applyConfigFile(flagSet: FlagSet, index: EnvIndex, options: ResolvedOptions, provided: Set<Flag>): void {
    // 1. Path: static first, then the designated flag's current value
    let path = options.configFile;
    if (!path && options.configFileFlag) {
        path = flagSet.getFlag(options.configFileFlag)?.getValue() ?? '';
    }

    const parser = options.configFileParser;
    if (!path || !parser) {
        return;
    }

    // 2. Read
    let content: Buffer | string;
    try {
        content = options.readFile(path);
    } catch (error) {
        if (isNotFound(error)) {
            if (options.configAllowMissingFile) {
                configLogger.debug(`${path} not found, skipping`);
                return;
            }
            throw new ConfigFileMissingError(path);
        }
        throw error;
    }
    configLogger.debug(`reading ${path}`);

    // 3. Decode and set
    const set: ConfigSetter = (name, value) => {
        const target = resolveConfigKey(flagSet, index, options, name);
        if (!target || provided.has(target)) {
            return;
        }
        configLogger.assigned('trace', name, value, describeFlag(target));
        target.setValue(value);
    };

    try {
        parser(typeof content === 'string' ? Buffer.from(content) : content, set);
    } catch (error) {
        throw wrapConfigError(path, error);
    }
}

/**
 * Maps a config key to a flag by flag name, then by env var key.
 * Returns undefined for unknown keys when they are tolerated.
 */
function resolveConfigKey(flagSet: FlagSet, index: EnvIndex, options: ResolvedOptions, name: string): Flag | undefined {
    if (!options.configKeyIgnoreFlagNames) {
        const flag = flagSet.getFlag(name);
        if (flag) {
            return flag;
        }
    }

    if (!options.configKeyIgnoreEnvVars) {
        const matches = index.get(name);
        if (matches && matches.length > 1) {
            throw new AmbiguousNameError(name, matches.map(describeFlag));
        }
        if (matches && matches.length === 1) {
            return matches[0];
        }
    }

    if (options.configIgnoreUndefinedFlags) {
        return undefined;
    }
    throw new UnknownFlagError(name);
}

function wrapConfigError(path: string, error: unknown): Error {
    if (
        error instanceof ParseValueError ||
        error instanceof AmbiguousNameError ||
        error instanceof StringConversionError ||
        error instanceof ConfigParseError
    ) {
        return error;
    }
    const cause = error instanceof Error ? error : new Error(String(error));
    return new ConfigParseError(`parse config file ${path}`, cause);
}

function isNotFound(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
