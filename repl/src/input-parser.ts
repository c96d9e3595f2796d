/**
 * Parses one line of REPL input.
 */
import type { SpecialCommand } from '@calc-repl/shared';

export type ParsedInput =
    | { type: 'empty' }
    | { type: 'command'; command: SpecialCommand }
    | { type: 'calculation'; operation: string; a: number; b: number }
    | { type: 'invalid'; reason: string };

const SPECIAL_COMMANDS: readonly SpecialCommand[] = ['help', 'history', 'exit'];

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;
const NON_FINITE_PATTERN = /^([+-]?)(inf|infinity|nan)$/i;

function isSpecialCommand(value: string): value is SpecialCommand {
    return SPECIAL_COMMANDS.some(command => command === value);
}

/**
 * Parse an operand token. Returns undefined for anything that is not a
 * decimal number or one of inf / infinity / nan.
 */
export function parseOperand(token: string): number | undefined {
    if (DECIMAL_PATTERN.test(token)) {
        return Number(token);
    }

    const match = NON_FINITE_PATTERN.exec(token);
    if (!match) {
        return undefined;
    }
    if (match[2].toLowerCase() === 'nan') {
        return NaN;
    }
    return match[1] === '-' ? -Infinity : Infinity;
}

export function parseInput(line: string): ParsedInput {
    const trimmed = line.trim();
    if (!trimmed) {
        return { type: 'empty' };
    }

    const command = trimmed.toLowerCase();
    if (isSpecialCommand(command)) {
        return { type: 'command', command };
    }

    const tokens = trimmed.split(/\s+/);
    if (tokens.length !== 3) {
        return { type: 'invalid', reason: `expected 3 tokens, got ${tokens.length}` };
    }

    const [operation, left, right] = tokens;
    const a = parseOperand(left);
    if (a === undefined) {
        return { type: 'invalid', reason: `'${left}' is not a number` };
    }
    const b = parseOperand(right);
    if (b === undefined) {
        return { type: 'invalid', reason: `'${right}' is not a number` };
    }

    return { type: 'calculation', operation, a, b };
}
