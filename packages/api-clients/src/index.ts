/**
 * @addrset/api-clients - API Client Package
 *
 * Public API exports for the address-set API client
 */

export { BaseApiClient, type BaseApiClientConfig, type RetryConfig } from './base-client.js';
export {
  AddressSetClient,
  type AddressSetClientConfig,
  type AddressSetReader,
  type AddressSetWriter,
  type AddressSetApi,
} from './address-set-client.js';
export * from './address-set-schemas.js';
export {
  classifyFailure,
  extractServerMessage,
  mentionsAuthFailure,
  toAddressSetError,
  type FailureClass,
  type FailureContext,
} from './failure-classification.js';
