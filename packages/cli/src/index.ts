/**
 * @addrset/cli - Command line interface
 *
 * Public API exports for the CLI package
 */

export * from './core/output-formatter.js';
export * from './core/error-handler.js';
export * from './core/command-context.js';
export * from './command-defs/address-sets.js';
export { registerAddressSetCommands, type RegisterOptions } from './commands/address-sets.js';
export * from './commands/address-sets/handlers.js';
