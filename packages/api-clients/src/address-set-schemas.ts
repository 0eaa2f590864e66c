/**
 * Address-set payload schemas
 *
 * Only `address` on an entry is checked, since membership compares it. Set
 * payloads are server-defined and pass through untouched, so a read → patch
 * round-trip keeps server-side additions.
 */

import { z } from 'zod';

export const AddressEntrySchema = z
  .object({
    address: z.string(),
    description: z.string().nullish(),
  })
  .passthrough();

export type AddressEntry = z.infer<typeof AddressEntrySchema>;

export const AddressSetSchema = z
  .object({
    id: z.unknown(),
    name: z.unknown(),
    entries: z.unknown(),
  })
  .passthrough();

export type AddressSet = z.infer<typeof AddressSetSchema>;

export const AddressEntryListSchema = z.array(AddressEntrySchema);

/**
 * `GET /address-sets` is returned as the server gives it: a list of sets, or
 * an object
 */
export const AddressSetListingSchema = z.union([
  z.array(z.unknown()),
  z.record(z.string(), z.unknown()),
]);

export type AddressSetListing = z.infer<typeof AddressSetListingSchema>;

/**
 * PATCH body: the complete desired entry collection, not a delta
 */
export interface PatchMembersBody {
  entries: AddressEntry[];
}
