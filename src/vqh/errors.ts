export class VqhError extends Error {
    constructor(message: string, public readonly cause?: unknown) {
        super(message);
        this.name = 'VqhError';
    }
}

export class EmptyInputError extends VqhError {
    constructor(message: string = 'Nothing to compress: input sequence is empty') {
        super(message);
        this.name = 'EmptyInputError';
    }
}

export class DegenerateTableError extends VqhError {
    constructor(message: string) {
        super(message);
        this.name = 'DegenerateTableError';
    }
}

export class InvalidSymbolError extends VqhError {
    constructor(public readonly symbol: unknown, public readonly position: number) {
        super(`Invalid symbol ${String(symbol)} at position ${position}: symbols must be non-negative integers`);
        this.name = 'InvalidSymbolError';
    }
}

export class UnknownSymbolError extends VqhError {
    constructor(public readonly symbol: number, public readonly position?: number) {
        super(position === undefined
            ? `Symbol ${symbol} has no entry in the code table`
            : `Symbol ${symbol} at position ${position} has no entry in the code table`);
        this.name = 'UnknownSymbolError';
    }
}

export class CorruptStreamError extends VqhError {
    constructor(message: string, public readonly expected?: number, public readonly actual?: number) {
        super(expected !== undefined && actual !== undefined
            ? `${message} (expected ${expected}, got ${actual})`
            : message);
        this.name = 'CorruptStreamError';
    }
}

export class MalformedContainerError extends VqhError {
    constructor(public readonly field: string, reason: string) {
        super(`Malformed container: field "${field}" ${reason}`);
        this.name = 'MalformedContainerError';
    }
}

export class ShapeMismatchError extends VqhError {
    constructor(message: string, public readonly expected: number, public readonly actual: number) {
        super(`${message} (expected ${expected}, got ${actual})`);
        this.name = 'ShapeMismatchError';
    }
}

export class IntegrityError extends VqhError {
    constructor(message: string, cause?: unknown) {
        super(message, cause);
        this.name = 'IntegrityError';
    }
}

export class LimitExceededError extends VqhError {
    constructor(message: string) {
        super(message);
        this.name = 'LimitExceededError';
    }
}
