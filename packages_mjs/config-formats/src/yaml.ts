import yaml from 'js-yaml';
import { ConfigFileParser, ConfigParseError, FlattenOptions, flattenDocument } from '@layerflag/flag-config';
import { toError } from './errors.js';

/**
 * YAML config files. An empty document sets nothing.
 */
export function yamlParser(options: FlattenOptions = {}): ConfigFileParser {
    return (input, set) => {
        let doc: unknown;
        try {
            doc = yaml.load(input.toString());
        } catch (error) {
            throw new ConfigParseError('failed to parse YAML config', toError(error));
        }
        flattenDocument(doc, set, options);
    };
}
