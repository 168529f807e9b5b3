/**
 * @txledger/shared - Logging, configuration and input schemas
 *
 * This package contains code shared between the ledger tools.
 */

export * from './schemas/index.js';
export * from './logger.js';
export * from './config/env.js';
