import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@addrset/utils';
import { AddressSetClient } from '@addrset/api-clients';
import { CommandContext } from '../../src/core/command-context.js';
import { InMemoryAddressSets } from '../../../../tests/helpers/in-memory-address-sets.js';

const config = {
  baseUrl: 'https://addrset.test/api',
  apiKey: 'test-key',
  timeoutMs: 2500,
  entryDescription: 'Added by on-call',
};

describe('CommandContext', () => {
  it('builds an authenticated client from configuration', () => {
    const ctx = new CommandContext({ config });
    const client = ctx.client();

    expect(client).toBeInstanceOf(AddressSetClient);
    expect(client).toBe(ctx.client());
    if (client instanceof AddressSetClient) {
      const defaults = client.getAxiosInstance().defaults;
      expect(defaults.baseURL).toBe('https://addrset.test/api');
      expect(defaults.timeout).toBe(2500);
      expect(defaults.headers.common['Authorization']).toBe('Bearer test-key');
    }
  });

  it('reads the environment when no configuration is given', () => {
    const ctx = new CommandContext();

    expect(() => ctx.client()).toThrow(ConfigurationError);
  });

  it('gives the membership service the configured entry description', async () => {
    const api = new InMemoryAddressSets({ 'blocklist-1': [] });
    const ctx = new CommandContext({ config, clientOverride: api });

    await ctx.membership().addMemberIfAbsent('blocklist-1', '5.6.7.8');

    expect(api.patches[0]?.entries).toEqual([{ address: '5.6.7.8', description: 'Added by on-call' }]);
  });
});
