export * from './api.controller.js';
export * from './auth.controller.js';
export * from './health.controller.js';
export * from './orders.controller.js';
export * from './payouts.controller.js';
export * from './revenue.controller.js';
