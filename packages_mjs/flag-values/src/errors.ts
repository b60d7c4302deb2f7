export class InvalidValueError extends Error {
    constructor(
        message: string,
        public input: string
    ) {
        super(message);
        this.name = 'InvalidValueError';
    }
}

export class DuplicateValueError extends InvalidValueError {
    constructor(input: string) {
        super(`duplicate value "${input}"`, input);
        this.name = 'DuplicateValueError';
    }
}
