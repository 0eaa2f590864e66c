import { describe, it, expect, afterEach } from 'vitest';
import { Command } from 'commander';
import { ZodError } from 'zod';
import { AuthError, type AddressSetApiConfig } from '@addrset/utils';
import { AUTH_FAILURE_MESSAGE } from '@addrset/services';
import { registerAddressSetCommands } from '../../src/commands/address-sets.js';
import { CommandContext } from '../../src/core/command-context.js';
import { InMemoryAddressSets } from '../../../../tests/helpers/in-memory-address-sets.js';

const config: AddressSetApiConfig = {
  baseUrl: 'https://addrset.test/api',
  apiKey: 'test-key',
  timeoutMs: 1000,
  entryDescription: 'Added by addrset',
};

function setup(api: InMemoryAddressSets) {
  const program = new Command().exitOverride();
  const output: string[] = [];
  const retriesSeen: Array<number | undefined> = [];
  registerAddressSetCommands(program, {
    createContext: (options) => {
      retriesSeen.push(options.retries);
      return new CommandContext({ ...options, config, clientOverride: api });
    },
    write: (text) => output.push(text),
  });
  const run = (...argv: string[]) => program.parseAsync(argv, { from: 'user' });
  return { run, output, retriesSeen };
}

function blocklist() {
  return new InMemoryAddressSets({ 'blocklist-1': [{ address: '1.2.3.4', description: 'seed' }] });
}

describe('address set commands', () => {
  afterEach(() => {
    process.exitCode = undefined;
  });

  it('test prints ok', async () => {
    const { run, output } = setup(blocklist());

    await run('test');

    expect(output).toEqual(['ok']);
    expect(process.exitCode).toBeUndefined();
  });

  it('test prints the API key hint and fails the process on auth errors', async () => {
    const api = blocklist();
    api.listSets = async () => {
      throw new AuthError('403 Forbidden', 403);
    };
    const { run, output } = setup(api);

    await run('test');

    expect(output).toEqual([AUTH_FAILURE_MESSAGE]);
    expect(process.exitCode).toBe(1);
  });

  it('sets lists the account sets as JSON', async () => {
    const { run, output } = setup(blocklist());

    await run('--format', 'json', 'sets');

    expect(JSON.parse(output[0] ?? '')).toEqual([{ id: 'blocklist-1' }]);
  });

  it('members renders a titled table', async () => {
    const { run, output } = setup(blocklist());

    await run('members', 'blocklist-1');

    expect(output[0]?.split('\n')).toEqual([
      'IP Addresses in Address Set',
      'address | description',
      '--------|------------',
      '1.2.3.4 | seed       ',
    ]);
  });

  it('is-blocked reports membership under its own field', async () => {
    const { run, output } = setup(blocklist());

    await run('--format', 'json', 'is-blocked', 'blocklist-1', '1.2.3.4');

    expect(JSON.parse(output[0] ?? '')).toEqual({
      addressSetId: 'blocklist-1',
      address: '1.2.3.4',
      isBlocked: true,
    });
  });

  it('add-member reports the added outcome, then the unchanged one', async () => {
    const api = blocklist();
    const { run, output } = setup(api);

    await run('--format', 'json', 'add-member', 'blocklist-1', '5.6.7.8');
    await run('--format', 'json', 'add-member', 'blocklist-1', '5.6.7.8');

    expect(JSON.parse(output[0] ?? '')).toMatchObject({ outcome: 'added', address: '5.6.7.8' });
    expect(JSON.parse(output[1] ?? '')).toMatchObject({ outcome: 'unchanged', address: '5.6.7.8' });
    expect(api.patches).toHaveLength(1);
  });

  it('add-member titles the table when nothing changed', async () => {
    const { run, output } = setup(blocklist());

    await run('add-member', 'blocklist-1', '1.2.3.4');

    expect(output[0]?.split('\n')[0]).toBe('IP address 1.2.3.4 is already a member of address set blocklist-1');
  });

  it('passes --retries to the context', async () => {
    const { run, retriesSeen } = setup(blocklist());

    await run('--retries', '2', 'sets');

    expect(retriesSeen).toEqual([2]);
  });

  it('rejects an address that is not an IP literal', async () => {
    const api = blocklist();
    const { run } = setup(api);

    await expect(run('add-member', 'blocklist-1', 'not-an-ip')).rejects.toBeInstanceOf(ZodError);
    expect(api.calls).toEqual([]);
  });
});
