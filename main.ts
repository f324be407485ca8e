#!/usr/bin/env node
import { createChatLoop } from './lib/cli';
import { executeCommand } from './lib/command-router';

async function main(): Promise<void> {
    const [command, ...args] = process.argv.slice(2);

    if (command) {
        await executeCommand(command, args);
        return;
    }

    createChatLoop(executeCommand, {
        prompt: '> ',
        welcomeMessage: 'Fetch Loader\nType "help" for available commands or "exit" to quit.\n',
        onExit: () => {
            console.log('Goodbye!');
        },
    });
}

main().catch((error: unknown) => {
    console.error('Error:', error);
    process.exitCode = 1;
});
