/**
 * Error types raised by the calculator core. Each one keeps the data it
 * describes as fields; `message` is the fallback text for logs.
 */
import type { CalculatorErrorCode } from '@calc-repl/shared';

export class CalculatorError extends Error {
    readonly code: CalculatorErrorCode;

    constructor(code: CalculatorErrorCode, message: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
    }
}

// A name was registered twice while wiring the registry at startup
export class ConfigurationError extends CalculatorError {
    readonly operation: string;

    constructor(operation: string) {
        super('CONFIGURATION_ERROR', `Calculation type '${operation}' is already registered.`);
        this.operation = operation;
    }
}

export class UnsupportedOperationError extends CalculatorError {
    readonly requested: string;
    readonly available: readonly string[];

    constructor(requested: string, available: readonly string[]) {
        super(
            'UNSUPPORTED_OPERATION',
            `Unsupported calculation type: '${requested}'. Available types: ${available.join(', ')}`
        );
        this.requested = requested;
        this.available = Object.freeze([...available]);
    }
}

/**
 * Operand values outside an operation's domain.
 */
export class DomainError extends CalculatorError {
    readonly operation: string;

    constructor(operation: string, message: string) {
        super('DOMAIN_ERROR', message);
        this.operation = operation;
    }
}

// Raised by the divide calculation before the arithmetic library is called
export class DivisionByZeroError extends DomainError {
    constructor() {
        super('divide', 'Cannot divide by zero.');
    }
}

// Raised by the arithmetic library itself
export class UndefinedResultError extends DomainError {}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
