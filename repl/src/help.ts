import type { CalculationRegistry } from './registry.js';

const EXAMPLES = [
    'add 10 5',
    'subtract 15.5 3.2',
    'multiply 7 8',
    'divide 20 4',
    'power 2 8'
];

export function formatHelp(registry: CalculationRegistry): string[] {
    const operations = registry.describe();
    const width = Math.max(8, ...operations.map(op => op.name.length)) + 2;

    return [
        'Calculator REPL Help',
        '--------------------',
        'Usage:',
        '    <operation> <number1> <number2>',
        '    - Perform a calculation with the specified operation and two numbers.',
        '    - Supported operations:',
        ...operations.map(op => `        ${op.name.padEnd(width)}: ${op.description}`),
        '',
        'Special Commands:',
        `    ${'help'.padEnd(width)}: Display this help message.`,
        `    ${'history'.padEnd(width)}: Show the history of calculations.`,
        `    ${'exit'.padEnd(width)}: Exit the calculator.`,
        '',
        'Examples:',
        ...EXAMPLES.map(example => `    ${example}`),
        ''
    ];
}
