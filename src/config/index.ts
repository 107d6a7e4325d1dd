export * from './base-api-config.js';
