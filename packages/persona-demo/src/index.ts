#!/usr/bin/env node
/**
 * Persona Demo CLI
 */

import { Command } from 'commander';
import { serveCommand } from './commands/serve.js';
import { sendCommand } from './commands/send.js';
import { parseCommand } from './commands/parse.js';

const program = new Command();

program
  .name('persona-demo')
  .description('Persona Demo CLI - minimal HTTP/1.1 codec and single-connection server')
  .version('0.1.0');

program.addCommand(serveCommand);
program.addCommand(sendCommand);
program.addCommand(parseCommand);

program.parseAsync().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
