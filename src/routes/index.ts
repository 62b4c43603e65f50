export { createAllocationsRouter } from './allocations.js';
export { createSecuritiesRouter } from './securities.js';
export { sendError } from './errors.js';
