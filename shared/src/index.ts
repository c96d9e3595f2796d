// Type definitions shared by the calculator packages

export type BuiltInOperation = 'add' | 'subtract' | 'multiply' | 'divide' | 'power';

export type CalculatorErrorCode = 'CONFIGURATION_ERROR' | 'UNSUPPORTED_OPERATION' | 'DOMAIN_ERROR';

export type SpecialCommand = 'help' | 'history' | 'exit';

export interface OperationDescription {
    name: string;
    description: string;
}

// What the session hands back to the input loop for one line
export type SessionReply =
    | { type: 'noop' }
    | { type: 'output'; lines: string[] }
    | { type: 'exit'; lines: string[] };

export type ReplExitReason = 'exit' | 'eof' | 'interrupt';

export interface ReplConfig {
    prompt: string;
    historyLimit: number;   // 0 keeps every calculation
    verbose: boolean;
}
