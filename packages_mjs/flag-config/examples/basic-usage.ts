import fs from 'fs';
import os from 'os';
import path from 'path';
import { Command, FlagSet, parse, plainParser } from '@layerflag/flag-config';

function example1_argsAndEnv() {
    console.log('\n--- Example 1: Args and Environment ---');

    const flags = new FlagSet('server');
    const verbose = flags.bool('v', 'verbose', false, 'log more');
    const delta = flags.duration('d', 'delta', 1000, 'tick interval');
    const host = flags.string('', 'host', 'localhost', 'listen host');

    const rest = parse(flags, ['--host', '0.0.0.0', 'serve'], {
        envVarPrefix: 'SERVER',
        env: { SERVER_DELTA: '33ms', SERVER_HOST: 'ignored.example' }
    });

    console.log('Resolved:', {
        verbose: verbose.get(),
        delta: delta.toString(),
        host: host.get(),
        rest
    });
}

function example2_configFile() {
    console.log('\n--- Example 2: Config File ---');

    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'layerflag-'));
    const file = path.join(dir, 'server.conf');
    fs.writeFileSync(file, [
        '# server settings',
        'port 9090',
        'tag  blue   # first tag',
        'tag  green'
    ].join('\n'));

    try {
        const flags = new FlagSet('server');
        flags.string('c', 'config', '', 'config file');
        const port = flags.int('p', 'port', 8080, 'listen port');
        const tags = flags.stringList('t', 'tag', 'instance tags');

        parse(flags, ['-c', file], { configFileFlag: 'config', configFileParser: plainParser });

        console.log('Resolved:', { port: port.get(), tags: tags.get() });
    } finally {
        fs.rmSync(dir, { recursive: true, force: true });
    }
}

async function example3_commands() {
    console.log('\n--- Example 3: Command Tree ---');

    const rootFlags = new FlagSet('textctl');
    const verbose = rootFlags.bool('v', 'verbose', false, 'log more');

    const repeatFlags = new FlagSet('repeat');
    const n = repeatFlags.int('n', '', 3, 'copies to print');

    const root = new Command({
        name: 'textctl',
        flags: rootFlags,
        subcommands: [
            new Command({
                name: 'repeat',
                flags: repeatFlags,
                exec: args => {
                    for (let i = 0; i < n.get(); i++) {
                        console.log(verbose.get() ? `${i}: ${args.join(' ')}` : args.join(' '));
                    }
                }
            })
        ]
    });

    await root.parseAndRun(['-v', 'repeat', '-n', '2', 'hello']);
}

example1_argsAndEnv();
example2_configFile();
example3_commands().catch(e => console.error('Error:', e));
