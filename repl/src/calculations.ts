/**
 * Built-in calculation kinds and the startup routine that registers them.
 */
import type { BuiltInOperation } from '@calc-repl/shared';
import * as arithmetic from './arithmetic.js';
import type { CalculationKind } from './calculation.js';
import { DivisionByZeroError } from './errors.js';
import type { CalculationRegistry } from './registry.js';

export type BuiltInCalculationKind = CalculationKind & { readonly name: BuiltInOperation };

export const addCalculation: BuiltInCalculationKind = {
    name: 'add',
    label: 'Add',
    description: 'Adds two numbers.',
    evaluate: arithmetic.add
};

export const subtractCalculation: BuiltInCalculationKind = {
    name: 'subtract',
    label: 'Subtract',
    description: 'Subtracts the second number from the first.',
    evaluate: arithmetic.subtract
};

export const multiplyCalculation: BuiltInCalculationKind = {
    name: 'multiply',
    label: 'Multiply',
    description: 'Multiplies two numbers.',
    evaluate: arithmetic.multiply
};

export const divideCalculation: BuiltInCalculationKind = {
    name: 'divide',
    label: 'Divide',
    description: 'Divides the first number by the second.',
    evaluate(a, b) {
        // Checked here as well as in arithmetic.divide; the two errors differ
        if (b === 0) {
            throw new DivisionByZeroError();
        }
        return arithmetic.divide(a, b);
    }
};

export const powerCalculation: BuiltInCalculationKind = {
    name: 'power',
    label: 'Power',
    description: 'Raises the first number to the power of the second.',
    evaluate: arithmetic.power
};

export const BUILT_IN_CALCULATIONS: readonly BuiltInCalculationKind[] = [
    addCalculation,
    subtractCalculation,
    multiplyCalculation,
    divideCalculation,
    powerCalculation
];

export function registerBuiltInCalculations(registry: CalculationRegistry): void {
    for (const kind of BUILT_IN_CALCULATIONS) {
        registry.registerKind(kind);
    }
}
