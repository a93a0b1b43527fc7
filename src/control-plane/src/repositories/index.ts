/**
 * Repository exports
 */

export { getDocClient, resetDocClient } from './base.repository.js';
export { AccountRepository } from './account.repository.js';
export { LedgerRepository } from './ledger.repository.js';
export { PriceRepository } from './price.repository.js';
export { JobRepository } from './job.repository.js';
export { TaskRepository } from './task.repository.js';
