/**
 * Plain config file format: one `name value` pair per line.
 *
 *   # full-line comment
 *   timeout 250ms     # end-of-line comment, needs a space before #
 *   foo     abc def   # foo = "abc def"
 *   foo     12345678  # repeated names set the flag again
 *   bar     "abc def" # quotes are kept
 *   verbose           # same as `verbose true`
 */

import { ConfigSetter } from './options.js';

export function plainParser(input: Buffer | string, set: ConfigSetter): void {
    const lines = input.toString().split(/\r?\n/);

    for (const raw of lines) {
        const line = raw.trim();
        if (line === '' || line.startsWith('#')) {
            continue;
        }

        const match = /\s/.exec(line);
        let name = match ? line.slice(0, match.index) : line;
        let value = match ? line.slice(match.index).trim() : 'true';

        name = name.replace(/^-+/, '');

        const comment = value.indexOf(' #');
        if (comment >= 0) {
            value = value.slice(0, comment).trim();
        }

        set(name, value);
    }
}
