// Core types and enums for the organization profile builder
export * from './enums.js';
export * from './organization.js';
export * from './lookups.js';
export * from './jsonld.js';
export * from './session.js';
export * from './api.js';
