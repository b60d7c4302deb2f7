/**
 * Parse options and their validation.
 */

import fs from 'fs';
import { z } from 'zod';
import { EnvNaming } from './env-names.js';
import { InvalidOptionsError } from './errors.js';

/**
 * Receives one name/value pair from a config file.
 */
export type ConfigSetter = (name: string, value: string) => void;

/**
 * Decodes config file content and reports every entry to set, in file order.
 */
export type ConfigFileParser = (input: Buffer, set: ConfigSetter) => void;

export type ReadFileFunc = (path: string) => Buffer | string;

/** Environment snapshot, as a record or as ordered pairs. */
export type EnvSnapshot = Record<string, string> | Array<[string, string]>;

export interface ParseOptions {
    /** Read flags from the env snapshot. Implied by envVarPrefix and envVarSplit. */
    envVars?: boolean;
    envVarPrefix?: string;
    /** Split env values on this separator, so one variable can set a repeatable flag several times. */
    envVarSplit?: string;
    envVarCaseSensitive?: boolean;
    envVarShortNames?: boolean;
    env?: EnvSnapshot;

    /** Static config file path. Takes priority over configFileFlag. */
    configFile?: string;
    /** Name of the flag whose value is the config file path. */
    configFileFlag?: string;
    configFileParser?: ConfigFileParser;
    configAllowMissingFile?: boolean;
    configIgnoreUndefinedFlags?: boolean;
    /** Do not match config keys against flag names. */
    configKeyIgnoreFlagNames?: boolean;
    /** Do not match config keys against env var names. */
    configKeyIgnoreEnvVars?: boolean;

    readFile?: ReadFileFunc;
}

export const ParseOptionsSchema = z.object({
    envVars: z.boolean().optional(),
    envVarPrefix: z.string().optional(),
    envVarSplit: z.string().optional(),
    envVarCaseSensitive: z.boolean().optional(),
    envVarShortNames: z.boolean().optional(),
    env: z.union([
        z.record(z.string()),
        z.array(z.tuple([z.string(), z.string()]))
    ]).optional(),
    configFile: z.string().optional(),
    configFileFlag: z.string().optional(),
    configFileParser: z.custom<ConfigFileParser>(v => typeof v === 'function', 'must be a function').optional(),
    configAllowMissingFile: z.boolean().optional(),
    configIgnoreUndefinedFlags: z.boolean().optional(),
    configKeyIgnoreFlagNames: z.boolean().optional(),
    configKeyIgnoreEnvVars: z.boolean().optional(),
    readFile: z.custom<ReadFileFunc>(v => typeof v === 'function', 'must be a function').optional()
}).strict();

export interface ResolvedOptions {
    envEnabled: boolean;
    naming: EnvNaming;
    envSplit: string;
    env: Array<[string, string]>;
    configFile: string;
    configFileFlag: string;
    configFileParser: ConfigFileParser | undefined;
    configAllowMissingFile: boolean;
    configIgnoreUndefinedFlags: boolean;
    configKeyIgnoreFlagNames: boolean;
    configKeyIgnoreEnvVars: boolean;
    readFile: ReadFileFunc;
}

const defaultReadFile: ReadFileFunc = path => fs.readFileSync(path);

export function resolveOptions(options: ParseOptions = {}): ResolvedOptions {
    const result = ParseOptionsSchema.safeParse(options);
    if (!result.success) {
        const errors = result.error.errors.map(e => `${e.path.join('.') || '(root)'}: ${e.message}`).join(', ');
        throw new InvalidOptionsError(errors);
    }

    const data = result.data;
    const envSplit = data.envVarSplit ?? '';
    const env = data.env ?? [];

    return {
        envEnabled: Boolean(data.envVars || data.envVarPrefix || envSplit),
        naming: {
            prefix: data.envVarPrefix ?? '',
            caseSensitive: data.envVarCaseSensitive ?? false,
            shortNames: data.envVarShortNames ?? false
        },
        envSplit,
        env: Array.isArray(env) ? env : Object.entries(env),
        configFile: data.configFile ?? '',
        configFileFlag: data.configFileFlag ?? '',
        configFileParser: data.configFileParser,
        configAllowMissingFile: data.configAllowMissingFile ?? false,
        configIgnoreUndefinedFlags: data.configIgnoreUndefinedFlags ?? false,
        configKeyIgnoreFlagNames: data.configKeyIgnoreFlagNames ?? false,
        configKeyIgnoreEnvVars: data.configKeyIgnoreEnvVars ?? false,
        readFile: data.readFile ?? defaultReadFile
    };
}
