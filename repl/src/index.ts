#!/usr/bin/env node
import { loadConfig } from './config.js';
import { ConfigurationError } from './errors.js';
import { createDefaultRegistry } from './registry.js';
import type { CalculationRegistry } from './registry.js';
import { runRepl } from './repl.js';
import { CalculatorSession } from './session.js';

async function main(): Promise<number> {
    const config = loadConfig();

    let registry: CalculationRegistry;
    try {
        registry = createDefaultRegistry({ verbose: config.verbose });
    } catch (error) {
        if (error instanceof ConfigurationError) {
            console.error(`[CalculationRegistry] Startup aborted: ${error.message}`);
            return 1;
        }
        throw error;
    }

    const session = new CalculatorSession({
        registry,
        historyLimit: config.historyLimit,
        verbose: config.verbose
    });

    const reason = await runRepl({
        session,
        input: process.stdin,
        output: process.stdout,
        prompt: config.prompt,
        terminal: process.stdin.isTTY ?? false
    });

    if (config.verbose) {
        console.log(`[Repl] Stopped (${reason}) after ${session.history.size} calculation(s)`);
    }
    return 0;
}

main()
    .then((code) => process.exit(code))
    .catch((error: unknown) => {
        console.error('[Repl] Fatal error:', error);
        process.exit(1);
    });
