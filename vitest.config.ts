import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['repl/src/**/*.test.ts'],
        environment: 'node'
    }
});
