#!/usr/bin/env node

/**
 * addrset CLI Entry Point
 */

import 'dotenv/config';
import { Command } from 'commander';
import { registerAddressSetCommands } from '../commands/address-sets.js';
import { handleError } from '../core/error-handler.js';

const program = new Command();

program
  .name('addrset')
  .description('Inspect and update address sets on the remote security service')
  .version('1.0.0');

registerAddressSetCommands(program);

program.configureOutput({
  writeErr: (str) => {
    process.stderr.write(str);
  },
});

async function main(): Promise<void> {
  try {
    await program.parseAsync();
  } catch (error) {
    const message = handleError(error, { command: program.args[0] });
    process.stderr.write(`Error: ${message}\n`);
    process.exitCode = 1;
  }
}

void main();
