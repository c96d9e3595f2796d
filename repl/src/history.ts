import { EventEmitter } from 'events';
import { v4 as uuid } from 'uuid';
import type { Calculation } from './calculation.js';

export interface HistoryEntry {
    readonly id: string;
    readonly recordedAt: Date;
    readonly calculation: Calculation;
    readonly result: number;
}

/**
 * Ordered, append-only list of the calculations run in one session.
 *
 * Emits `recorded` for each new entry and `evicted` when `limit` pushes the
 * oldest entry out.
 */
export class CalculationHistory extends EventEmitter {
    private items: HistoryEntry[] = [];
    private limit: number;

    constructor(limit: number = 0) {
        super();
        this.limit = Math.max(0, Math.floor(limit));
    }

    /**
     * Execute `calculation` and append it. Nothing is stored if execution throws.
     */
    record(calculation: Calculation): HistoryEntry {
        const entry: HistoryEntry = Object.freeze({
            id: uuid(),
            recordedAt: new Date(),
            calculation,
            result: calculation.execute()
        });

        this.items.push(entry);
        this.emit('recorded', entry);

        while (this.limit > 0 && this.items.length > this.limit) {
            const evicted = this.items.shift();
            if (evicted) {
                this.emit('evicted', evicted);
            }
        }
        return entry;
    }

    entries(): HistoryEntry[] {
        return [...this.items];
    }

    get size(): number {
        return this.items.length;
    }

    isEmpty(): boolean {
        return this.items.length === 0;
    }

    formatLines(): string[] {
        if (this.items.length === 0) {
            return ['No calculations performed yet.'];
        }
        return [
            'Calculation History:',
            ...this.items.map((entry, index) => `${index + 1}. ${entry.calculation.toDisplayString()}`)
        ];
    }
}
