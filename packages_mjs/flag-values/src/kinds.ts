/**
 * Constructors for the built-in value kinds.
 */

import { formatDuration, parseDuration } from './duration.js';
import { EnumValue } from './enum.js';
import { List, UniqueList } from './lists.js';
import { formatFloat, parseBool, parseFloat, parseInt, parseString, parseUint } from './parsers.js';
import { Value } from './value.js';

export type BoolValue = Value<boolean>;
export type IntValue = Value<number>;
export type FloatValue = Value<number>;
export type StringValue = Value<string>;
/** Milliseconds. */
export type DurationValue = Value<number>;

export function boolValue(def: boolean = false): BoolValue {
    return new Value({ parse: parseBool, default: def, placeholder: 'BOOL', isBool: true });
}

export function intValue(def: number = 0): IntValue {
    return new Value({ parse: parseInt, default: def, placeholder: 'INT' });
}

export function uintValue(def: number = 0): IntValue {
    if (def < 0 || !Number.isSafeInteger(def)) {
        throw new Error(`invalid unsigned default ${def}`);
    }
    return new Value({ parse: parseUint, default: def, placeholder: 'UINT' });
}

export function floatValue(def: number = 0): FloatValue {
    return new Value({ parse: parseFloat, format: formatFloat, default: def, placeholder: 'FLOAT' });
}

export function stringValue(def: string = ''): StringValue {
    return new Value({ parse: parseString, default: def, placeholder: 'STRING' });
}

export function durationValue(def: number = 0): DurationValue {
    return new Value({ parse: parseDuration, format: formatDuration, default: def, placeholder: 'DURATION' });
}

export function stringList(): List<string> {
    return new List({ parse: parseString, placeholder: 'STRING' });
}

export function stringSet(): UniqueList<string> {
    return new UniqueList({ parse: parseString, placeholder: 'STRING' });
}

export function intList(): List<number> {
    return new List({ parse: parseInt, placeholder: 'INT' });
}

export function durationList(): List<number> {
    return new List({ parse: parseDuration, format: formatDuration, placeholder: 'DURATION' });
}

export function stringEnum(...choices: string[]): EnumValue {
    return new EnumValue(choices);
}
