import { createInterface } from 'readline';
import type { ReplExitReason } from '@calc-repl/shared';
import type { CalculatorSession } from './session.js';

export interface ReplOptions {
    session: CalculatorSession;
    input: NodeJS.ReadableStream;
    output: NodeJS.WritableStream;
    prompt: string;
    terminal?: boolean;
}

/**
 * Read lines from `input` until `exit`, end of input or Ctrl+C, writing the
 * session's replies to `output`. Resolves with the reason the loop stopped.
 */
export function runRepl(options: ReplOptions): Promise<ReplExitReason> {
    const { session, input, output, prompt } = options;

    const rl = createInterface({
        input,
        output,
        prompt,
        terminal: options.terminal ?? false
    });

    const write = (lines: string[]) => {
        for (const line of lines) {
            output.write(`${line}\n`);
        }
    };

    return new Promise((resolve) => {
        let reason: ReplExitReason | undefined;

        const finish = (exitReason: ReplExitReason, lines: string[]) => {
            if (reason) return;
            reason = exitReason;
            write(lines);
            rl.close();
        };

        rl.on('line', (line) => {
            if (reason) return;

            const reply = session.handleLine(line);
            if (reply.type === 'exit') {
                finish('exit', reply.lines);
                return;
            }
            if (reply.type === 'output') {
                write(reply.lines);
            }
            rl.prompt();
        });

        rl.on('SIGINT', () => {
            finish('interrupt', ['', 'Keyboard interrupt detected. Exiting calculator. Goodbye!']);
        });

        rl.on('close', () => {
            if (!reason) {
                write(['', 'EOF detected. Exiting calculator. Goodbye!']);
            }
            reason = reason ?? 'eof';
            resolve(reason);
        });

        write(session.greeting());
        rl.prompt();
    });
}
