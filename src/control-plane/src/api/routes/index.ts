/**
 * Route exports
 */

export { createAccountRouter } from './account.routes.js';
export { createHealthRouter } from './health.routes.js';
export { createJobRouter } from './job.routes.js';
export { createModelRouter } from './model.routes.js';
