/**
 * textctl: a small command tree wired to the process.
 *
 *   textctl [-v] repeat [-n TIMES] ARG
 *   textctl [-v] count ARG...
 */

import {
    Command,
    FlagSet,
    isHelpRequested,
    isNoExec
} from '@layerflag/flag-config';
import { envFileSnapshot, parserForFile } from '@layerflag/config-formats';
import { commandHelp } from '@layerflag/flag-help';

const rootFlags = new FlagSet('textctl');
const verbose = rootFlags.bool('v', 'verbose', false, 'increase log verbosity');
const configPath = rootFlags.string('', 'config', '', 'config file (JSON, YAML, TOML, .env or plain)');

const repeatFlags = new FlagSet('repeat');
const times = repeatFlags.int('n', '', 3, 'how many `TIMES` to repeat');

const repeat = new Command({
    name: 'repeat',
    usage: 'textctl repeat [-n TIMES] ARG',
    shortHelp: 'repeatedly print the first argument to stdout',
    flags: repeatFlags,
    exec: args => {
        if (args.length < 1) {
            throw new Error('repeat requires at least 1 argument');
        }
        if (verbose.get()) {
            process.stderr.write(`repeat: n=${times.get()}\n`);
        }
        for (let i = 0; i < times.get(); i++) {
            process.stdout.write(`${args[0]}\n`);
        }
    }
});

const count = new Command({
    name: 'count',
    usage: 'textctl count [ARG...]',
    shortHelp: 'count the number of bytes in the arguments',
    exec: args => {
        const n = args.reduce((sum, arg) => sum + Buffer.byteLength(arg), 0);
        process.stdout.write(`${n}\n`);
    }
});

const root = new Command({
    name: 'textctl',
    usage: 'textctl [FLAGS] SUBCOMMAND ...',
    shortHelp: 'text utilities',
    flags: rootFlags,
    subcommands: [repeat, count]
});

async function main(argv: string[]): Promise<number> {
    const env = envFileSnapshot({ files: ['.env'], env: process.env });

    try {
        await root.parse(argv, {
            envVarPrefix: 'TEXTCTL',
            env,
            configFileFlag: 'config',
            // picked when the file is read, after --config has been parsed
            configFileParser: (input, set) => parserForFile(configPath.get())(input, set),
            configAllowMissingFile: true,
            // each level sees only its own and its ancestors' flags
            configIgnoreUndefinedFlags: true
        });
    } catch (error) {
        process.stderr.write(commandHelp(root));
        if (isHelpRequested(error)) {
            return 0;
        }
        process.stderr.write(`\nerror: ${error instanceof Error ? error.message : String(error)}\n`);
        return 1;
    }

    try {
        await root.run();
    } catch (error) {
        if (isNoExec(error)) {
            process.stderr.write(commandHelp(root));
            return 0;
        }
        process.stderr.write(`error: ${error instanceof Error ? error.message : String(error)}\n`);
        return 1;
    }
    return 0;
}

main(process.argv.slice(2)).then(code => {
    process.exitCode = code;
});
