/**
 * Services Package Logger
 * =======================
 * Logger for the services package with namespace '@addrset/services'
 */

import { createLogger } from '@addrset/utils';

export const logger = createLogger('@addrset/services');
