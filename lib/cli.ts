import * as readline from 'readline';
import { ChatLoopOptions } from './models';

export type { ChatLoopOptions };

export type CommandExecutor = (command: string, args: string[]) => Promise<boolean>;

/**
 * Splits a line on unquoted spaces.
 * A quote only closes on the same character it opened with, so "it's" stays intact.
 */
function tokenize(input: string): string[] {
    const tokens: string[] = [];
    let current = '';
    let quote: string | null = null;

    for (const char of input) {
        if (quote) {
            if (char === quote) {
                quote = null;
            } else {
                current += char;
            }
        } else if (char === '"' || char === "'") {
            quote = char;
        } else if (char === ' ') {
            if (current) {
                tokens.push(current);
                current = '';
            }
        } else {
            current += char;
        }
    }
    if (current) {
        tokens.push(current);
    }

    return tokens;
}

/**
 * Parses a command line string into command and arguments
 */
export function parseCommand(input: string): { command: string; args: string[] } {
    const [command = '', ...args] = tokenize(input.trim());
    return { command, args };
}

/**
 * Creates and runs a chat loop
 * @param commandExecutor Function that executes commands and returns whether to continue
 * @param options Configuration options for the chat loop
 */
export function createChatLoop(
    commandExecutor: CommandExecutor,
    options: ChatLoopOptions = {},
): void {
    const { prompt = '> ', welcomeMessage, onExit } = options;

    const rl = readline.createInterface({
        input: process.stdin,
        output: process.stdout,
        prompt,
    });

    if (welcomeMessage) {
        console.log(welcomeMessage);
    }

    rl.prompt();

    rl.on('line', async (input: string) => {
        const { command, args } = parseCommand(input);
        try {
            const shouldContinue = await commandExecutor(command, args);

            if (!shouldContinue) {
                rl.close();
                return;
            }
        } catch (error) {
            console.error('Error:', error);
        }

        console.log();
        rl.prompt();
    });

    rl.on('close', () => {
        onExit?.();
        process.exit(0);
    });
}
