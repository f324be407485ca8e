import { fetchResource } from './commands';

/**
 * Checks if help flag is present in arguments
 */
function hasHelpFlag(args: string[]): boolean {
    return args.includes('-h') || args.includes('--help');
}

export type FetchArgs = {
    target?: string;
    outputPath?: string;
    showBody: boolean;
    missingValue: boolean; // --out given without a path
}

/**
 * Splits fetch arguments into the target URL and its options
 */
export function parseFetchArgs(args: string[]): FetchArgs {
    let target: string | undefined;
    let outputPath: string | undefined;
    let showBody = false;
    let missingValue = false;

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '--out' || arg === '-o') {
            if (i + 1 >= args.length) {
                missingValue = true;
                break;
            }
            outputPath = args[i + 1];
            i++;
        } else if (arg === '--show' || arg === '-s') {
            showBody = true;
        } else if (!arg.startsWith('-') && target === undefined) {
            target = arg;
        }
    }

    return { target, outputPath, showBody, missingValue };
}

/**
 * Executes a command with given arguments
 */
export async function executeCommand(command: string, args: string[]): Promise<boolean> {
    try {
        switch (command) {
            case 'fetch':
            case 'f': {
                const { target, outputPath, showBody, missingValue } = parseFetchArgs(args);
                if (hasHelpFlag(args) || !target || missingValue) {
                    printFetchHelp();
                    return true;
                }

                await fetchResource(target, { outputPath, showBody });
                return true;
            }

            case 'help':
            case '--help':
            case '-h':
                printHelp();
                return true;

            case 'exit':
            case 'quit':
            case 'q':
                console.log('Goodbye!');
                return false;

            case 'clear':
            case 'cls':
                console.clear();
                return true;

            default:
                if (command) {
                    console.error(`Unknown command: ${command}`);
                    console.log('Type "help" for usage information.');
                } else {
                    printHelp();
                }
                return true;
        }
    } catch (error) {
        console.error('Error:', error);
        return true;
    }
}

/**
 * Prints help for fetch command
 */
function printFetchHelp(): void {
    console.log(`
fetch, f - Download a URL and report the result

Usage:
  fetch <url> [options]

Options:
  --out, -o <file>    Write the response body to a file
  --show, -s          Print the response body as text

Examples:
  fetch https://example.com/
  fetch https://example.com/data.json --show
  fetch https://example.com/logo.png --out ./downloads/logo.png
`);
}

/**
 * Prints general help
 */
function printHelp(): void {
    console.log(`
Available commands:
  fetch, f <url>       Download a URL (see "fetch --help")
  clear, cls           Clear the screen
  help, -h             Show this help
  exit, quit, q        Exit
`);
}
