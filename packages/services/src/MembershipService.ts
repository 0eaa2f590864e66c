/**
 * Membership Service
 * ==================
 * Membership lookups and conditional adds over a single address set.
 *
 * `addMemberIfAbsent` is read-then-write against the remote service with no
 * lock, version check or conditional write. Another actor mutating the same
 * set between the read and the PATCH can lose an entry or add a duplicate.
 */

import { DEFAULT_ENTRY_DESCRIPTION } from '@addrset/utils';
import type { AddressEntry, AddressSet, AddressSetApi } from '@addrset/api-clients';
import { logger } from './logger.js';

export interface MembershipServiceOptions {
  /** Description stored on entries this service adds */
  entryDescription?: string;
}

export type AddMemberResult =
  | { outcome: 'added'; address: string; set: AddressSet }
  | { outcome: 'unchanged'; address: string; members: AddressEntry[] };

export function findMember(entries: readonly AddressEntry[], address: string): AddressEntry | undefined {
  return entries.find((entry) => entry.address === address);
}

export class MembershipService {
  private readonly entryDescription: string;

  constructor(
    private readonly client: AddressSetApi,
    options: MembershipServiceOptions = {}
  ) {
    this.entryDescription = options.entryDescription ?? DEFAULT_ENTRY_DESCRIPTION;
  }

  /**
   * True iff some entry's address equals `address` exactly (case-sensitive)
   */
  async isMember(id: string, address: string): Promise<boolean> {
    const members = await this.client.listMembers(id);
    return findMember(members, address) !== undefined;
  }

  /**
   * Alias of isMember; the set id decides that the set is a blocklist
   */
  async isBlocked(id: string, address: string): Promise<boolean> {
    return this.isMember(id, address);
  }

  /**
   * Alias of isMember; the set id decides that the set is a throttle list
   */
  async isThrottled(id: string, address: string): Promise<boolean> {
    return this.isMember(id, address);
  }

  /**
   * Append `address` to the set unless an entry already carries it.
   *
   * The member list read for the check is the one patched, so there is a
   * single GET before the PATCH.
   */
  async addMemberIfAbsent(id: string, address: string): Promise<AddMemberResult> {
    const log = logger.child({ addressSetId: id, address });
    const members = await this.client.listMembers(id);

    if (findMember(members, address)) {
      log.info('Address already a member, skipping update');
      return { outcome: 'unchanged', address, members };
    }

    const entries: AddressEntry[] = [...members, { address, description: this.entryDescription }];
    const set = await this.client.patchMembers(id, entries);

    log.info('Added address to address set', { entryCount: entries.length });
    return { outcome: 'added', address, set };
  }
}
