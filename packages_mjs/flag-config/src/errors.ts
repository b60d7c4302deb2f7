export class FlagConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'FlagConfigError';
    }
}

export class UnknownFlagError extends FlagConfigError {
    constructor(public flagName: string) {
        super(`unknown flag ${flagName}`);
        this.name = 'UnknownFlagError';
    }
}

export class MissingValueError extends FlagConfigError {
    constructor(public flagName: string) {
        super(`${flagName}: missing value`);
        this.name = 'MissingValueError';
    }
}

export class ParseValueError extends FlagConfigError {
    constructor(
        public flagName: string,
        public value: string,
        public cause: Error
    ) {
        super(`${flagName}: set "${value}": ${cause.message}`);
        this.name = 'ParseValueError';
    }
}

export class AmbiguousNameError extends FlagConfigError {
    constructor(
        public key: string,
        public flagNames: string[]
    ) {
        super(`ambiguous name ${key}: matches ${flagNames.map(n => `(${n})`).join(' and ')}`);
        this.name = 'AmbiguousNameError';
    }
}

export class DuplicateFlagError extends FlagConfigError {
    constructor(
        public flagName: string,
        public existingName: string
    ) {
        super(`${flagName}: duplicate flag (${existingName})`);
        this.name = 'DuplicateFlagError';
    }
}

export class InvalidFlagError extends FlagConfigError {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidFlagError';
    }
}

export class InvalidOptionsError extends FlagConfigError {
    constructor(message: string) {
        super(`invalid parse options: ${message}`);
        this.name = 'InvalidOptionsError';
    }
}

export class InvalidCommandError extends FlagConfigError {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidCommandError';
    }
}

export class ConfigFileMissingError extends FlagConfigError {
    constructor(public path: string) {
        super(`config file not found: ${path}`);
        this.name = 'ConfigFileMissingError';
    }
}

export class ConfigParseError extends FlagConfigError {
    constructor(
        message: string,
        public cause?: Error
    ) {
        super(cause ? `${message}: ${cause.message}` : message);
        this.name = 'ConfigParseError';
    }
}

export class StringConversionError extends FlagConfigError {
    constructor(public value: unknown) {
        super(`couldn't convert ${String(value)} (${describeKind(value)}) to string`);
        this.name = 'StringConversionError';
    }
}

export class AlreadyParsedError extends FlagConfigError {
    constructor(public setName: string) {
        super(`${setName}: already parsed`);
        this.name = 'AlreadyParsedError';
    }
}

export class NotParsedError extends FlagConfigError {
    constructor(public commandName: string) {
        super(`${commandName}: not parsed`);
        this.name = 'NotParsedError';
    }
}

/**
 * Raised when -h or --help is given and not declared. Callers print usage and exit 0.
 */
export class HelpRequestedError extends FlagConfigError {
    constructor() {
        super('help requested');
        this.name = 'HelpRequestedError';
    }
}

/**
 * Raised when the selected command has no exec function.
 */
export class NoExecError extends FlagConfigError {
    constructor(public commandName: string) {
        super(`${commandName}: no exec function`);
        this.name = 'NoExecError';
    }
}

export function isHelpRequested(error: unknown): error is HelpRequestedError {
    return error instanceof HelpRequestedError;
}

export function isNoExec(error: unknown): error is NoExecError {
    return error instanceof NoExecError;
}

function describeKind(value: unknown): string {
    if (value === null) return 'null';
    if (value instanceof Date) return 'Date';
    if (Array.isArray(value)) return 'array';
    return typeof value;
}
