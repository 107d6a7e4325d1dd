export * from './build-no-sql-match.util.js';
export * from './convert-object-ids-to-strings.util.js';
