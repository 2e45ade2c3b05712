#!/usr/bin/env node
import process from 'node:process';

import { parseCliArgs, renderCliUsage } from './cli.js';
import { serverVersion } from './config.js';
import { logError } from './observability.js';
import { startStdioServer } from './server.js';

process.on('unhandledRejection', (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason));
  logError('Unhandled rejection', error);
});

const command = parseCliArgs(process.argv.slice(2));

switch (command.kind) {
  case 'invalid':
    process.stderr.write(`${command.message}\n\n${renderCliUsage()}`);
    process.exitCode = 1;
    break;
  case 'help':
    process.stdout.write(renderCliUsage());
    break;
  case 'version':
    process.stdout.write(`${serverVersion}\n`);
    break;
  case 'serve':
    try {
      await startStdioServer();
    } catch (error: unknown) {
      logError(
        'Failed to start server',
        error instanceof Error ? error : { error: String(error) }
      );
      process.exitCode = 1;
    }
    break;
}
