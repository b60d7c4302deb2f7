import fs from 'fs';
import dotenv from 'dotenv';
import { ReadFileFunc } from '@layerflag/flag-config';

export interface EnvFileSnapshotOptions {
    /** Read in order; a later file overrides an earlier one. */
    files: string[];
    /** Entries here win over every file, e.g. the process environment. */
    env?: Record<string, string | undefined>;
    /** Skip files that do not exist. Default true. */
    allowMissing?: boolean;
    readFile?: ReadFileFunc;
}

/**
 * Builds an env snapshot for parse() from dotenv files plus a live
 * environment, without touching process.env.
 */
export function envFileSnapshot(options: EnvFileSnapshotOptions): Record<string, string> {
    const readFile = options.readFile ?? ((path: string) => fs.readFileSync(path));
    const allowMissing = options.allowMissing ?? true;
    const snapshot: Record<string, string> = {};

    for (const path of options.files) {
        let content: Buffer | string;
        try {
            content = readFile(path);
        } catch (error) {
            if (allowMissing && error instanceof Error && 'code' in error && error.code === 'ENOENT') {
                continue;
            }
            throw error;
        }
        Object.assign(snapshot, dotenv.parse(content));
    }

    for (const [key, value] of Object.entries(options.env ?? {})) {
        if (value !== undefined) {
            snapshot[key] = value;
        }
    }
    return snapshot;
}
