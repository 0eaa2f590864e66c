/**
 * Address Set Commands
 */

import type { Command } from 'commander';
import { CommandContext, type CommandContextOptions } from '../core/command-context.js';
import { renderCommandOutput, type CommandOutput } from '../core/output-formatter.js';
import {
  globalOptionsSchema,
  membershipArgsSchema,
  setIdArgsSchema,
} from '../command-defs/address-sets.js';
import {
  addMemberHandler,
  getSetHandler,
  listMembersHandler,
  listSetsHandler,
  membershipCheckHandler,
  testConnectionHandler,
  type MembershipCheck,
} from './address-sets/handlers.js';

export interface RegisterOptions {
  createContext?: (options: CommandContextOptions) => CommandContext;
  write?: (text: string) => void;
}

const MEMBERSHIP_COMMANDS: ReadonlyArray<{ name: string; check: MembershipCheck; description: string }> = [
  { name: 'is-member', check: 'isMember', description: 'Check whether an IP address is in an address set' },
  { name: 'is-blocked', check: 'isBlocked', description: 'Check whether an IP address is in a blocklist set' },
  { name: 'is-throttled', check: 'isThrottled', description: 'Check whether an IP address is in a throttle set' },
];

/**
 * Register address set commands and the global output options
 */
export function registerAddressSetCommands(program: Command, options: RegisterOptions = {}): void {
  const createContext = options.createContext ?? ((contextOptions) => new CommandContext(contextOptions));
  const write = options.write ?? ((text: string) => process.stdout.write(`${text}\n`));

  program
    .option('--format <format>', 'Output format (table, json)', 'table')
    .option('--retries <n>', 'Retries per request on network or 5xx failures', '0');

  const run = async (handler: (ctx: CommandContext) => Promise<CommandOutput>): Promise<CommandOutput> => {
    const globals = globalOptionsSchema.parse(program.opts());
    const output = await handler(createContext({ retries: globals.retries }));
    write(renderCommandOutput(output, globals.format));
    return output;
  };

  program
    .command('test')
    .description('Test API connectivity and authentication')
    .action(async () => {
      const output = await run(testConnectionHandler);
      if (output.raw !== 'ok') {
        process.exitCode = 1;
      }
    });

  program
    .command('sets')
    .description('List the address sets on the account')
    .action(async () => {
      await run(listSetsHandler);
    });

  program
    .command('set <id>')
    .description('Show the configuration of an address set')
    .action(async (id: string) => {
      const args = setIdArgsSchema.parse({ id });
      await run((ctx) => getSetHandler(args, ctx));
    });

  program
    .command('members <id>')
    .description('List the IP addresses in an address set')
    .action(async (id: string) => {
      const args = setIdArgsSchema.parse({ id });
      await run((ctx) => listMembersHandler(args, ctx));
    });

  for (const { name, check, description } of MEMBERSHIP_COMMANDS) {
    program
      .command(`${name} <id> <address>`)
      .description(description)
      .action(async (id: string, address: string) => {
        const args = membershipArgsSchema.parse({ id, address });
        await run((ctx) => membershipCheckHandler(check, args, ctx));
      });
  }

  program
    .command('add-member <id> <address>')
    .description('Add an IP address to an address set unless it is already a member')
    .action(async (id: string, address: string) => {
      const args = membershipArgsSchema.parse({ id, address });
      await run((ctx) => addMemberHandler(args, ctx));
    });
}
