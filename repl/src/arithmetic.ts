import { UndefinedResultError } from './errors.js';

export function add(a: number, b: number): number {
    return a + b;
}

export function subtract(a: number, b: number): number {
    return a - b;
}

export function multiply(a: number, b: number): number {
    return a * b;
}

/**
 * @throws UndefinedResultError when `b` is zero (either sign)
 */
export function divide(a: number, b: number): number {
    if (b === 0) {
        throw new UndefinedResultError('divide', 'Division by zero is not allowed.');
    }
    return a / b;
}

// 0^0, fractional powers of negatives and the like follow Math.pow
export function power(base: number, exponent: number): number {
    return Math.pow(base, exponent);
}
