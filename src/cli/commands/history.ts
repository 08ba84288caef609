/**
 * ctxi history command
 */

import { Command } from 'commander';
import type { ApiClient } from '../api-client.js';
import { formatHistory, writeError, writeJson, writeStdout } from '../output.js';
import { parsePositiveInt } from './context.js';

export function historyCommand(program: Command, getClient: () => ApiClient): void {
    program
        .command('history')
        .description('List logged interactions, oldest first')
        .option('-s, --session <id>', 'Only this session')
        .option('-k, --kind <kind>', 'Only this interaction kind')
        .option('-l, --limit <n>', 'Maximum interactions', parsePositiveInt)
        .option('--json', 'Print the full JSON response')
        .action(async (options: { session?: string; kind?: string; limit?: number; json?: boolean }) => {
            try {
                const response = await getClient().history({ sessionId: options.session, kind: options.kind, limit: options.limit });
                if (options.json) {
                    writeJson(response);
                } else {
                    writeStdout(formatHistory(response));
                }
            } catch (error) {
                writeError(error instanceof Error ? error.message : String(error));
                process.exitCode = 1;
            }
        });
}
