export * from './mongo-find.query.js';
export * from './mongo-find-one.query.js';
export * from './mongo-get-by-id.query.js';
