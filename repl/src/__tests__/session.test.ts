import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { DomainError, UndefinedResultError, UnsupportedOperationError } from '../errors.js';
import { createDefaultRegistry } from '../registry.js';
import { CalculatorSession, describeFailure } from '../session.js';
import type { RejectedInput } from '../session.js';
import type { HistoryEntry } from '../history.js';

describe('CalculatorSession', () => {
    let session: CalculatorSession;

    beforeEach(() => {
        session = new CalculatorSession({ registry: createDefaultRegistry() });
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should ignore blank lines', () => {
        expect(session.handleLine('   ')).toEqual({ type: 'noop' });
    });

    it('should print and record a successful calculation', () => {
        expect(session.handleLine('add 5 3')).toEqual({ type: 'output', lines: ['Result: Add: 5 Add 3 = 8', ''] });
        expect(session.history.size).toBe(1);
    });

    it('should match operation names case-insensitively', () => {
        expect(session.handleLine('MULTIPLY 7 8')).toEqual({
            type: 'output',
            lines: ['Result: Multiply: 7 Multiply 8 = 56', '']
        });
    });

    it('should explain malformed input', () => {
        expect(session.handleLine('add 5')).toEqual({
            type: 'output',
            lines: [
                'Invalid input. Please follow the format: <operation> <num1> <num2>',
                "Type 'help' for more information.",
                ''
            ]
        });
        expect(session.history.isEmpty()).toBe(true);
    });

    it('should list operations for an unsupported name', () => {
        expect(session.handleLine('modulo 1 1')).toEqual({
            type: 'output',
            lines: [
                "Unsupported calculation type: 'modulo'. Available types: add, subtract, multiply, divide, power",
                "Type 'help' to see the list of supported operations.",
                ''
            ]
        });
    });

    it('should report division by zero without recording it', () => {
        expect(session.handleLine('divide 20 0')).toEqual({
            type: 'output',
            lines: ['Cannot divide by zero!', 'Please enter a non-zero divisor.', '']
        });
        expect(session.history.isEmpty()).toBe(true);
    });

    describe('commands', () => {
        it('should show help', () => {
            const reply = session.handleLine('help');
            expect(reply.type).toBe('output');
            if (reply.type === 'output') {
                expect(reply.lines[0]).toBe('Calculator REPL Help');
                expect(reply.lines).toContain('        power     : Raises the first number to the power of the second.');
            }
        });

        it('should show an empty history', () => {
            expect(session.handleLine('history')).toEqual({
                type: 'output',
                lines: ['No calculations performed yet.', '']
            });
        });

        it('should show the history in order', () => {
            session.handleLine('add 10 5');
            session.handleLine('divide 1 0');
            session.handleLine('subtract 10 4');

            expect(session.handleLine('HISTORY')).toEqual({
                type: 'output',
                lines: [
                    'Calculation History:',
                    '1. Add: 10 Add 5 = 15',
                    '2. Subtract: 10 Subtract 4 = 6',
                    ''
                ]
            });
        });

        it('should exit', () => {
            expect(session.handleLine('exit')).toEqual({ type: 'exit', lines: ['Exiting calculator. Goodbye!', ''] });
        });
    });

    it('should honor the history limit', () => {
        const limited = new CalculatorSession({ registry: createDefaultRegistry(), historyLimit: 1 });
        limited.handleLine('add 1 1');
        limited.handleLine('add 2 2');

        expect(limited.history.formatLines()).toEqual(['Calculation History:', '1. Add: 2 Add 2 = 4']);
    });

    describe('events', () => {
        it('should emit calculated with the history entry', () => {
            const entries: HistoryEntry[] = [];
            session.on('calculated', (entry: HistoryEntry) => entries.push(entry));

            session.handleLine('power 2 8');

            expect(entries).toHaveLength(1);
            expect(entries[0].result).toBe(256);
            expect(entries[0].calculation.operation).toBe('power');
        });

        it('should emit rejected with the failing input', () => {
            const rejected: RejectedInput[] = [];
            session.on('rejected', (event: RejectedInput) => rejected.push(event));

            session.handleLine('modulo 1 1');
            session.handleLine('add x y');

            expect(rejected).toHaveLength(2);
            expect(rejected[0].input).toBe('modulo 1 1');
            expect(rejected[0].error).toBeInstanceOf(UnsupportedOperationError);
            expect(rejected[1].input).toBe('add x y');
        });
    });

    it('should log when verbose', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => {});
        const verbose = new CalculatorSession({ registry: createDefaultRegistry(), verbose: true });
        log.mockClear();

        verbose.handleLine('add 5 3');

        expect(log).toHaveBeenCalledWith('[CalculatorSession] Recorded Add(a=5, b=3) -> 8');
    });

    it('should greet the user', () => {
        expect(session.greeting()[0]).toBe('Welcome to the calculator REPL!');
    });
});

describe('describeFailure', () => {
    it('should treat the library divide error like the calculation one', () => {
        expect(describeFailure(new UndefinedResultError('divide', 'Division by zero is not allowed.'))).toEqual([
            'Cannot divide by zero!',
            'Please enter a non-zero divisor.'
        ]);
    });

    it('should format other domain errors', () => {
        expect(describeFailure(new DomainError('power', 'Result is not a real number.'))).toEqual([
            'Invalid operands: Result is not a real number.',
            'Please try again.'
        ]);
    });

    it('should format unexpected errors', () => {
        expect(describeFailure(new Error('boom'))).toEqual([
            'An error occurred during calculation: boom',
            'Please try again.'
        ]);
        expect(describeFailure('plain string')).toEqual([
            'An error occurred during calculation: plain string',
            'Please try again.'
        ]);
    });
});
