export * from './mongo-create.command.js';
