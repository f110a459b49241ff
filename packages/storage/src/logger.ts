/**
 * Storage Package Logger
 * ======================
 * Centralized logger for the storage package with namespace '@paramlab/storage'
 */

import { createLogger } from '@paramlab/utils';

export const logger = createLogger('@paramlab/storage');
