import { NotFoundError } from '@addrset/utils';
import type { AddressEntry, AddressSet, AddressSetApi, AddressSetListing } from '@addrset/api-clients';

/**
 * In-memory stand-in for the remote address-set API. Records every call so
 * tests can assert which requests a service made.
 */
export class InMemoryAddressSets implements AddressSetApi {
  readonly calls: string[] = [];
  readonly patches: Array<{ id: string; entries: AddressEntry[] }> = [];
  private readonly sets: Map<string, AddressEntry[]>;

  constructor(initial: Record<string, AddressEntry[]>) {
    this.sets = new Map(Object.entries(initial).map(([id, entries]) => [id, entries.map((e) => ({ ...e }))]));
  }

  async listSets(): Promise<AddressSetListing> {
    this.calls.push('listSets');
    return [...this.sets.keys()].map((id) => ({ id }));
  }

  async getSet(id: string): Promise<AddressSet> {
    this.calls.push(`getSet:${id}`);
    return { id, entries: this.entriesOf(id) };
  }

  async listMembers(id: string): Promise<AddressEntry[]> {
    this.calls.push(`listMembers:${id}`);
    return this.entriesOf(id);
  }

  async patchMembers(id: string, entries: AddressEntry[]): Promise<AddressSet> {
    this.calls.push(`patchMembers:${id}`);
    this.entriesOf(id);
    this.patches.push({ id, entries: entries.map((e) => ({ ...e })) });
    this.sets.set(id, entries.map((e) => ({ ...e })));
    return { id, entries: this.entriesOf(id) };
  }

  private entriesOf(id: string): AddressEntry[] {
    const entries = this.sets.get(id);
    if (!entries) {
      throw new NotFoundError('Address set resource', `/address-sets/${id}`);
    }
    return entries.map((e) => ({ ...e }));
  }
}
