import { EventEmitter } from 'events';
import type { SessionReply } from '@calc-repl/shared';
import { CalculationHistory } from './history.js';
import type { HistoryEntry } from './history.js';
import { DivisionByZeroError, DomainError, UndefinedResultError, UnsupportedOperationError, errorMessage } from './errors.js';
import { formatHelp } from './help.js';
import { parseInput } from './input-parser.js';
import type { CalculationRegistry } from './registry.js';

export interface SessionOptions {
    registry: CalculationRegistry;
    historyLimit?: number;
    verbose?: boolean;
}

export interface RejectedInput {
    input: string;
    error: unknown;
}

/**
 * One interactive calculator session: turns input lines into replies and
 * keeps the history of successful calculations.
 *
 * Events: `calculated` (HistoryEntry), `rejected` (RejectedInput).
 */
export class CalculatorSession extends EventEmitter {
    readonly history: CalculationHistory;
    private registry: CalculationRegistry;
    private verbose: boolean;

    constructor(options: SessionOptions) {
        super();
        this.registry = options.registry;
        this.verbose = options.verbose ?? false;
        this.history = new CalculationHistory(options.historyLimit);

        this.history.on('evicted', (entry: HistoryEntry) => {
            this.log(`Evicted ${entry.calculation.toDebugString()} from history`);
        });
    }

    greeting(): string[] {
        return [
            'Welcome to the calculator REPL!',
            "Type 'help' for instructions, 'history' for history of calculations, or 'exit' to quit.",
            ''
        ];
    }

    handleLine(line: string): SessionReply {
        const parsed = parseInput(line);

        switch (parsed.type) {
            case 'empty':
                return { type: 'noop' };

            case 'command':
                if (parsed.command === 'help') {
                    return { type: 'output', lines: formatHelp(this.registry) };
                }
                if (parsed.command === 'history') {
                    return { type: 'output', lines: [...this.history.formatLines(), ''] };
                }
                return { type: 'exit', lines: ['Exiting calculator. Goodbye!', ''] };

            case 'invalid':
                this.reject(line, new Error(parsed.reason));
                return {
                    type: 'output',
                    lines: [
                        'Invalid input. Please follow the format: <operation> <num1> <num2>',
                        "Type 'help' for more information.",
                        ''
                    ]
                };

            case 'calculation':
                return this.calculate(line, parsed.operation, parsed.a, parsed.b);
        }
    }

    private calculate(line: string, operation: string, a: number, b: number): SessionReply {
        try {
            const calculation = this.registry.create(operation, a, b);
            const entry = this.history.record(calculation);
            this.log(`Recorded ${calculation.toDebugString()} -> ${entry.result}`);
            this.emit('calculated', entry);
            return { type: 'output', lines: [`Result: ${calculation.toDisplayString()}`, ''] };
        } catch (error) {
            this.reject(line, error);
            return { type: 'output', lines: [...describeFailure(error), ''] };
        }
    }

    private reject(input: string, error: unknown): void {
        this.log(`Rejected '${input.trim()}': ${errorMessage(error)}`);
        this.emit('rejected', { input, error } satisfies RejectedInput);
    }

    private log(message: string): void {
        if (this.verbose) {
            console.log(`[CalculatorSession] ${message}`);
        }
    }
}

/**
 * User-facing lines for a failed calculation.
 */
export function describeFailure(error: unknown): string[] {
    if (error instanceof UnsupportedOperationError) {
        return [
            `Unsupported calculation type: '${error.requested}'. Available types: ${error.available.join(', ')}`,
            "Type 'help' to see the list of supported operations."
        ];
    }
    if (error instanceof DivisionByZeroError || (error instanceof UndefinedResultError && error.operation === 'divide')) {
        return ['Cannot divide by zero!', 'Please enter a non-zero divisor.'];
    }
    if (error instanceof DomainError) {
        return [`Invalid operands: ${error.message}`, 'Please try again.'];
    }
    return [`An error occurred during calculation: ${errorMessage(error)}`, 'Please try again.'];
}
