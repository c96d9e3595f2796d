/**
 * REPL configuration: defaults, an optional JSON file, then environment overrides.
 */
import { existsSync, readFileSync } from 'fs';
import { isAbsolute, join } from 'path';
import type { ReplConfig } from '@calc-repl/shared';

export const CONFIG_FILE_NAME = 'calc-repl.config.json';

export const DEFAULT_CONFIG: ReplConfig = {
    prompt: '>> ',
    historyLimit: 0,
    verbose: false
};

export interface ValidationResult<T> {
    valid: boolean;
    data?: T;
    error?: string;
}

export interface LoadConfigOptions {
    cwd?: string;
    env?: NodeJS.ProcessEnv;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isHistoryLimit(value: unknown): value is number {
    return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

/**
 * Check a parsed config file. Unknown keys are ignored.
 */
export function validateConfig(value: unknown): ValidationResult<Partial<ReplConfig>> {
    if (!isRecord(value)) {
        return { valid: false, error: 'config must be an object' };
    }

    const data: Partial<ReplConfig> = {};

    if (value.prompt !== undefined) {
        if (typeof value.prompt !== 'string') {
            return { valid: false, error: 'prompt must be a string' };
        }
        data.prompt = value.prompt;
    }

    if (value.historyLimit !== undefined) {
        if (!isHistoryLimit(value.historyLimit)) {
            return { valid: false, error: 'historyLimit must be a non-negative integer' };
        }
        data.historyLimit = value.historyLimit;
    }

    if (value.verbose !== undefined) {
        if (typeof value.verbose !== 'boolean') {
            return { valid: false, error: 'verbose must be a boolean' };
        }
        data.verbose = value.verbose;
    }

    return { valid: true, data };
}

function readConfigFile(configFile: string): Partial<ReplConfig> {
    if (!existsSync(configFile)) {
        return {};
    }

    try {
        const parsed: unknown = JSON.parse(readFileSync(configFile, 'utf-8'));
        const result = validateConfig(parsed);
        if (!result.valid || !result.data) {
            console.error(`[Config] Ignoring ${configFile}: ${result.error}`);
            return {};
        }
        return result.data;
    } catch (error) {
        console.error('[Config] Error loading config:', error);
        return {};
    }
}

function envOverrides(env: NodeJS.ProcessEnv): Partial<ReplConfig> {
    const overrides: Partial<ReplConfig> = {};

    if (env.CALC_REPL_PROMPT !== undefined) {
        overrides.prompt = env.CALC_REPL_PROMPT;
    }

    if (env.CALC_REPL_HISTORY_LIMIT !== undefined) {
        const limit = Number(env.CALC_REPL_HISTORY_LIMIT);
        if (isHistoryLimit(limit) && env.CALC_REPL_HISTORY_LIMIT.trim() !== '') {
            overrides.historyLimit = limit;
        } else {
            console.error(`[Config] Ignoring CALC_REPL_HISTORY_LIMIT=${env.CALC_REPL_HISTORY_LIMIT}`);
        }
    }

    if (env.CALC_REPL_VERBOSE !== undefined) {
        overrides.verbose = ['1', 'true', 'yes'].includes(env.CALC_REPL_VERBOSE.toLowerCase());
    }

    return overrides;
}

export function resolveConfigPath(cwd: string, env: NodeJS.ProcessEnv): string {
    const configured = env.CALC_REPL_CONFIG;
    if (configured) {
        return isAbsolute(configured) ? configured : join(cwd, configured);
    }
    return join(cwd, CONFIG_FILE_NAME);
}

export function loadConfig(options: LoadConfigOptions = {}): ReplConfig {
    const cwd = options.cwd ?? process.cwd();
    const env = options.env ?? process.env;

    return {
        ...DEFAULT_CONFIG,
        ...readConfigFile(resolveConfigPath(cwd, env)),
        ...envOverrides(env)
    };
}
