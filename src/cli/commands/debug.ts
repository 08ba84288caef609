/**
 * ctxi debug command
 */

import { Command } from 'commander';
import type { ApiClient } from '../api-client.js';
import { formatDebug, writeError, writeJson, writeStdout } from '../output.js';

export function debugCommand(program: Command, getClient: () => ApiClient): void {
    program
        .command('debug')
        .description('Show intent, branches and per-interaction scores for a message (read-only)')
        .argument('<message...>', 'Message (multiple words allowed)')
        .option('-s, --session <id>', 'Session id of the caller')
        .option('--json', 'Print the full JSON response')
        .action(async (message: string[], options: { session?: string; json?: boolean }) => {
            try {
                const response = await getClient().relevanceDebug(message.join(' '), options.session);
                if (options.json) {
                    writeJson(response);
                } else {
                    writeStdout(formatDebug(response));
                }
            } catch (error) {
                writeError(error instanceof Error ? error.message : String(error));
                process.exitCode = 1;
            }
        });
}
