import type { AxiosInstance } from 'axios';
import type { z } from 'zod';
import { createLogger, ServerError } from '@addrset/utils';
import { BaseApiClient, type RetryConfig } from './base-client.js';
import {
  AddressEntryListSchema,
  AddressSetListingSchema,
  AddressSetSchema,
  type AddressEntry,
  type AddressSet,
  type AddressSetListing,
  type PatchMembersBody,
} from './address-set-schemas.js';

const logger = createLogger('api-clients');

export interface AddressSetClientConfig {
  baseURL: string;
  /** Sent as `Authorization: Bearer <apiKey>`; omitted requests go out unauthenticated */
  apiKey?: string;
  timeout?: number;
  retry?: RetryConfig;
  /** Optional axios instance for testing */
  axiosInstance?: AxiosInstance;
}

/**
 * Read side of the address-set API
 */
export interface AddressSetReader {
  listSets(): Promise<AddressSetListing>;
  getSet(id: string): Promise<AddressSet>;
  listMembers(id: string): Promise<AddressEntry[]>;
}

/**
 * Write side of the address-set API
 */
export interface AddressSetWriter {
  patchMembers(id: string, entries: AddressEntry[]): Promise<AddressSet>;
}

export type AddressSetApi = AddressSetReader & AddressSetWriter;

const ADDRESS_SETS_PATH = '/address-sets';

function setPath(id: string): string {
  return `${ADDRESS_SETS_PATH}/${encodeURIComponent(id)}`;
}

/**
 * Stateless client for the remote address-set API. Holds only the connection
 * settings given at construction.
 */
export class AddressSetClient extends BaseApiClient implements AddressSetApi {
  constructor(config: AddressSetClientConfig) {
    super({
      baseURL: config.baseURL,
      apiName: 'AddressSets',
      timeout: config.timeout,
      retry: config.retry,
      axiosInstance: config.axiosInstance,
    });

    if (config.apiKey) {
      this.axiosInstance.defaults.headers.common['Authorization'] = `Bearer ${config.apiKey}`;
    }
  }

  /**
   * All address sets on the account, as the server returns them
   */
  async listSets(): Promise<AddressSetListing> {
    const data = await this.get<unknown>(ADDRESS_SETS_PATH);
    return this.parseResponse(AddressSetListingSchema, data, 'listSets');
  }

  async getSet(id: string): Promise<AddressSet> {
    const data = await this.get<unknown>(setPath(id));
    return this.parseResponse(AddressSetSchema, data, 'getSet', id);
  }

  async listMembers(id: string): Promise<AddressEntry[]> {
    const data = await this.get<unknown>(`${setPath(id)}/addresses`);
    return this.parseResponse(AddressEntryListSchema, data, 'listMembers', id);
  }

  /**
   * Replace the set's entry collection with `entries`. The server sees the
   * full collection, so callers pass existing entries plus any new ones.
   */
  async patchMembers(id: string, entries: AddressEntry[]): Promise<AddressSet> {
    const body: PatchMembersBody = { entries };
    logger.debug('Patching address set members', { addressSetId: id, entryCount: entries.length });
    const data = await this.patch<unknown>(setPath(id), body);
    return this.parseResponse(AddressSetSchema, data, 'patchMembers', id);
  }

  private parseResponse<S extends z.ZodTypeAny>(
    schema: S,
    data: unknown,
    operation: string,
    addressSetId?: string
  ): z.infer<S> {
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      throw new ServerError(
        `Unexpected ${operation} response from ${this.apiName}${where}: ${issue?.message ?? 'invalid body'}`,
        undefined,
        data,
        { operation, addressSetId },
        'INVALID_RESPONSE'
      );
    }
    return parsed.data;
  }
}
