import { classifyFailure, type AddressSetReader } from '@addrset/api-clients';
import { logger } from './logger.js';

export const CONNECTION_OK = 'ok';
export const AUTH_FAILURE_MESSAGE = 'Authorization Error: make sure API Key is correctly set';

export type ConnectionTestResult = typeof CONNECTION_OK | typeof AUTH_FAILURE_MESSAGE;

/**
 * Check connectivity and credentials by listing address sets.
 *
 * Auth failures come back as a remediation message; every other failure is
 * rethrown.
 */
export async function testConnection(client: Pick<AddressSetReader, 'listSets'>): Promise<ConnectionTestResult> {
  try {
    await client.listSets();
  } catch (error) {
    if (classifyFailure(error) === 'auth') {
      logger.warn('Connection test rejected credentials', {
        error: error instanceof Error ? error.message : String(error),
      });
      return AUTH_FAILURE_MESSAGE;
    }
    throw error;
  }
  return CONNECTION_OK;
}
