export * from './custom.error.js';
export * from './auth.error.js';
export * from './bad-request.error.js';
export * from './conflict.error.js';
export * from './duplicate-key.error.js';
export * from './not-found.error.js';
export * from './server.error.js';
export * from './store-unavailable.error.js';
export * from './validation.error.js';
