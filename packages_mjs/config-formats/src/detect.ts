import path from 'path';
import { ConfigFileParser, FlattenOptions, plainParser } from '@layerflag/flag-config';
import { dotenvParser } from './dotenv.js';
import { jsonParser } from './json.js';
import { tomlParser } from './toml.js';
import { yamlParser } from './yaml.js';

export type ConfigFormat = 'json' | 'yaml' | 'toml' | 'dotenv' | 'plain';

export function detectFormat(filePath: string): ConfigFormat {
    const base = path.basename(filePath).toLowerCase();
    if (base === '.env' || base.startsWith('.env.')) {
        return 'dotenv';
    }

    switch (path.extname(base)) {
        case '.json':
            return 'json';
        case '.yaml':
        case '.yml':
            return 'yaml';
        case '.toml':
            return 'toml';
        case '.env':
            return 'dotenv';
        default:
            return 'plain';
    }
}

export function parserForFormat(format: ConfigFormat, options: FlattenOptions = {}): ConfigFileParser {
    switch (format) {
        case 'json':
            return jsonParser(options);
        case 'yaml':
            return yamlParser(options);
        case 'toml':
            return tomlParser(options);
        case 'dotenv':
            return dotenvParser;
        case 'plain':
            return plainParser;
    }
}

/**
 * Picks a parser from the file name, falling back to the plain format.
 */
export function parserForFile(filePath: string, options: FlattenOptions = {}): ConfigFileParser {
    return parserForFormat(detectFormat(filePath), options);
}
