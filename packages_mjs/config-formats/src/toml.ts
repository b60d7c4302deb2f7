import { parse } from '@iarna/toml';
import { ConfigFileParser, ConfigParseError, FlattenOptions, flattenDocument } from '@layerflag/flag-config';
import { toError } from './errors.js';

/**
 * TOML config files. Tables nest like mappings; date and time values are rejected.
 */
export function tomlParser(options: FlattenOptions = {}): ConfigFileParser {
    return (input, set) => {
        let doc: unknown;
        try {
            doc = parse(input.toString());
        } catch (error) {
            throw new ConfigParseError('failed to parse TOML config', toError(error));
        }
        flattenDocument(doc, set, options);
    };
}
