import type { CommandContext } from '../../core/command-context.js';
import type { CommandOutput } from '../../core/output-formatter.js';
import type { MembershipArgs, SetIdArgs } from '../../command-defs/address-sets.js';
import { testConnection } from '@addrset/services';

export type MembershipCheck = 'isMember' | 'isBlocked' | 'isThrottled';

export async function testConnectionHandler(ctx: CommandContext): Promise<CommandOutput> {
  const result = await testConnection(ctx.client());
  return { display: result, raw: result };
}

export async function listSetsHandler(ctx: CommandContext): Promise<CommandOutput> {
  const sets = await ctx.client().listSets();
  return { title: 'Address Sets', display: sets, raw: sets };
}

export async function getSetHandler(args: SetIdArgs, ctx: CommandContext): Promise<CommandOutput> {
  const set = await ctx.client().getSet(args.id);
  return { title: 'Address Set Config', display: set, raw: set };
}

export async function listMembersHandler(args: SetIdArgs, ctx: CommandContext): Promise<CommandOutput> {
  const members = await ctx.client().listMembers(args.id);
  return { title: 'IP Addresses in Address Set', display: members, raw: members };
}

export async function membershipCheckHandler(
  check: MembershipCheck,
  args: MembershipArgs,
  ctx: CommandContext
): Promise<CommandOutput> {
  const value = await ctx.membership()[check](args.id, args.address);
  const row = { addressSetId: args.id, address: args.address, [check]: value };
  return { title: 'Address Set Membership', display: row, raw: row };
}

/**
 * Table output shows the confirmed set after an add, or the unchanged member
 * list; JSON output carries the outcome either way.
 */
export async function addMemberHandler(args: MembershipArgs, ctx: CommandContext): Promise<CommandOutput> {
  const result = await ctx.membership().addMemberIfAbsent(args.id, args.address);

  if (result.outcome === 'added') {
    return { title: 'Address Set Config', display: result.set, raw: result };
  }
  return {
    title: `IP address ${args.address} is already a member of address set ${args.id}`,
    display: result.members,
    raw: result,
  };
}
