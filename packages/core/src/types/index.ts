export * from './department.js';
export * from './identity.js';
export * from './messages.js';
