import { z } from 'zod';

export const MAX_RETRIES = 10;

export const globalOptionsSchema = z.object({
  format: z.enum(['json', 'table']).default('table'),
  retries: z.coerce.number().int().min(0).max(MAX_RETRIES).default(0),
});

export const setIdArgsSchema = z.object({
  id: z.string().trim().min(1, 'address set id is required'),
});

export const membershipArgsSchema = setIdArgsSchema.extend({
  address: z.string().trim().ip({ message: 'address must be an IPv4 or IPv6 address' }),
});

export type OutputFormat = z.infer<typeof globalOptionsSchema>['format'];
export type GlobalOptions = z.infer<typeof globalOptionsSchema>;
export type SetIdArgs = z.infer<typeof setIdArgsSchema>;
export type MembershipArgs = z.infer<typeof membershipArgsSchema>;
