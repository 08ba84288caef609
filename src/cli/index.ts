#!/usr/bin/env node
/**
 * ctxi - command-line interface for the context intelligence REST API
 */

import { Command } from 'commander';
import { ApiClient } from './api-client.js';
import { contextCommand } from './commands/context.js';
import { debugCommand } from './commands/debug.js';
import { historyCommand } from './commands/history.js';
import { getApiUrl } from './config.js';
import { getBuildVersion } from '../utils/build-version.js';

export function buildProgram(createClient: (baseUrl: string) => ApiClient = url => new ApiClient(url)): Command {
    const program = new Command();

    program
        .name('ctxi')
        .description('Query the context intelligence engine over its REST API')
        .version(getBuildVersion())
        .option('-u, --url <url>', 'API base URL', getApiUrl());

    const getClient = (): ApiClient => {
        const opts = program.opts<{ url: string }>();
        return createClient(opts.url);
    };

    contextCommand(program, getClient);
    debugCommand(program, getClient);
    historyCommand(program, getClient);

    return program;
}

if (require.main === module) {
    buildProgram().parseAsync().catch((error: unknown) => {
        process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
        process.exitCode = 1;
    });
}
