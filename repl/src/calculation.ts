/**
 * Uniform calculation type.
 *
 * A calculation binds one operation kind to an operand pair. Every kind shares
 * the same implementation below and differs only in its `CalculationKind`,
 * which carries the display label and the arithmetic behavior.
 */
export interface CalculationKind {
    /** Registry key, lower case. */
    readonly name: string;
    /** Display label, e.g. `Add`. */
    readonly label: string;
    /** One-line summary shown by `help`. */
    readonly description: string;
    evaluate(a: number, b: number): number;
}

export interface Calculation {
    readonly operation: string;
    readonly label: string;
    readonly a: number;
    readonly b: number;

    /** Runs the operation. Errors from the operation propagate unchanged. */
    execute(): number;

    /** `<Label>: <a> <Label> <b> = <result>`. Executes, so it can throw. */
    toDisplayString(): string;

    /** `<Label>(a=<a>, b=<b>)`. Never executes. */
    toDebugString(): string;
}

/**
 * Builds a calculation for the name it was registered under. The registry
 * passes its own normalized key as `operation`.
 */
export type CalculationBuilder = (a: number, b: number, operation: string) => Calculation;

class BoundCalculation implements Calculation {
    readonly label: string;

    constructor(
        private readonly kind: CalculationKind,
        readonly operation: string,
        readonly a: number,
        readonly b: number
    ) {
        this.label = kind.label;
        Object.freeze(this);
    }

    execute(): number {
        return this.kind.evaluate(this.a, this.b);
    }

    toDisplayString(): string {
        const result = this.execute();
        return `${this.label}: ${this.a} ${this.label} ${this.b} = ${result}`;
    }

    toDebugString(): string {
        return `${this.label}(a=${this.a}, b=${this.b})`;
    }
}

/**
 * Create the builder the registry stores for a kind.
 */
export function defineCalculation(kind: CalculationKind): CalculationBuilder {
    return (a, b, operation) => new BoundCalculation(kind, operation, a, b);
}
