/**
 * @addrset/services - Membership services package
 *
 * Public API exports for the services package
 */

export {
  MembershipService,
  findMember,
  type AddMemberResult,
  type MembershipServiceOptions,
} from './MembershipService.js';
export {
  testConnection,
  CONNECTION_OK,
  AUTH_FAILURE_MESSAGE,
  type ConnectionTestResult,
} from './connection-test.js';

// Package logger
export { logger } from './logger.js';
