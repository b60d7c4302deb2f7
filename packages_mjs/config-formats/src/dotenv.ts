import { ConfigFileParser, ConfigParseError } from '@layerflag/flag-config';

/**
 * `.env` config files: NAME=value per line, `#` starts a comment line only.
 * Values are taken verbatim, except that a "double quoted" value is unquoted
 * with its escapes (\n, \t, \", \\, \uXXXX) expanded.
 * Names usually match flags through their env var keys, e.g. APP_DRY_RUN.
 */
export const dotenvParser: ConfigFileParser = (input, set) => {
    const lines = input.toString().split(/\r?\n/);

    for (const raw of lines) {
        const line = raw.trim();
        if (line === '' || line.startsWith('#')) {
            continue;
        }

        const eq = line.indexOf('=');
        if (eq < 0) {
            throw new ConfigParseError(`invalid line: ${line}`);
        }

        const name = line.slice(0, eq).trim().replace(/^export\s+/, '');
        const value = line.slice(eq + 1).trim();
        if (name === '') {
            throw new ConfigParseError(`invalid line: ${line}`);
        }

        set(name, unquote(value));
    }
};

/**
 * Double-quoted values go through the JSON string grammar; anything it
 * rejects is kept as written.
 */
export function unquote(value: string): string {
    if (value.length < 2 || !value.startsWith('"') || !value.endsWith('"')) {
        return value;
    }
    try {
        const parsed: unknown = JSON.parse(value);
        return typeof parsed === 'string' ? parsed : value;
    } catch {
        return value;
    }
}
