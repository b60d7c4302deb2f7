import { ConfigFileParser, ConfigParseError, FlattenOptions, flattenDocument } from '@layerflag/flag-config';
import { toError } from './errors.js';

/**
 * JSON config files. The document must be an object; arrays set a flag once per element.
 */
export function jsonParser(options: FlattenOptions = {}): ConfigFileParser {
    return (input, set) => {
        let doc: unknown;
        try {
            doc = JSON.parse(input.toString());
        } catch (error) {
            throw new ConfigParseError('failed to parse JSON config', toError(error));
        }
        flattenDocument(doc, set, options);
    };
}
