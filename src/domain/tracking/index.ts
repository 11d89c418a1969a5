export * from './contracts/tracking-backend.js';
export * from './errors.js';
export * from './value-objects/identity.js';
