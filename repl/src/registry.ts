import type { OperationDescription } from '@calc-repl/shared';
import { defineCalculation } from './calculation.js';
import type { Calculation, CalculationBuilder, CalculationKind } from './calculation.js';
import { registerBuiltInCalculations } from './calculations.js';
import { ConfigurationError, UnsupportedOperationError } from './errors.js';

export interface RegistryOptions {
    verbose?: boolean;
}

interface RegistryEntry {
    builder: CalculationBuilder;
    description: string;
}

/**
 * Maps case-insensitive operation names to calculation builders.
 *
 * Names are append-only: there is no unregister, and registering a name twice
 * throws without touching the existing entry.
 */
export class CalculationRegistry {
    private entries: Map<string, RegistryEntry> = new Map();
    private verbose: boolean;

    constructor(options: RegistryOptions = {}) {
        this.verbose = options.verbose ?? false;
    }

    /**
     * Without a description, `help` shows a generic line naming the operation.
     */
    register(name: string, builder: CalculationBuilder, description?: string): void {
        const key = normalizeName(name);
        if (this.entries.has(key)) {
            throw new ConfigurationError(key);
        }

        this.entries.set(key, { builder, description: description || defaultDescription(key) });
        if (this.verbose) {
            console.log(`[CalculationRegistry] Registered calculation '${key}'`);
        }
    }

    registerKind(kind: CalculationKind): void {
        this.register(normalizeName(kind.name), defineCalculation(kind), kind.description);
    }

    /**
     * Build a calculation for `name` bound to `a` and `b`.
     */
    create(name: string, a: number, b: number): Calculation {
        const key = normalizeName(name);
        const entry = this.entries.get(key);
        if (!entry) {
            throw new UnsupportedOperationError(name, this.names());
        }
        return entry.builder(a, b, key);
    }

    has(name: string): boolean {
        return this.entries.has(normalizeName(name));
    }

    /** Registered names in registration order. */
    names(): string[] {
        return [...this.entries.keys()];
    }

    describe(): OperationDescription[] {
        return [...this.entries].map(([name, entry]) => ({ name, description: entry.description }));
    }

    get size(): number {
        return this.entries.size;
    }
}

function normalizeName(name: string): string {
    return name.toLowerCase();
}

function defaultDescription(key: string): string {
    return `Performs the '${key}' calculation.`;
}

export function createDefaultRegistry(options: RegistryOptions = {}): CalculationRegistry {
    const registry = new CalculationRegistry(options);
    registerBuiltInCalculations(registry);
    return registry;
}
