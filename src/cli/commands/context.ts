/**
 * ctxi context command
 */

import { Command, InvalidArgumentError } from 'commander';
import type { ApiClient } from '../api-client.js';
import { formatContext, writeError, writeJson, writeStdout } from '../output.js';

export function parsePositiveInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new InvalidArgumentError('must be a positive integer');
    }
    return parsed;
}

export function contextCommand(program: Command, getClient: () => ApiClient): void {
    program
        .command('context')
        .description('Assemble context for a message and print the rendered prompt')
        .argument('<message...>', 'Message (multiple words allowed)')
        .requiredOption('-b, --budget <chars>', 'Context budget in characters', parsePositiveInt)
        .option('-s, --session <id>', 'Session id of the caller')
        .option('--user <id>', 'User id whose preferences may be included')
        .option('--json', 'Print the full JSON response')
        .action(async (message: string[], options: { budget: number; session?: string; user?: string; json?: boolean }) => {
            try {
                const response = await getClient().context(message.join(' '), options.budget, {
                    sessionId: options.session,
                    userId: options.user
                });
                if (options.json) {
                    writeJson(response);
                } else {
                    writeStdout(formatContext(response));
                }
            } catch (error) {
                writeError(error instanceof Error ? error.message : String(error));
                process.exitCode = 1;
            }
        });
}
