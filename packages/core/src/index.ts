export * from './types.js';
export * from './schema.js';
export * from './errors.js';
export * from './config.js';
export * from './records.js';
export * from './locations.js';
export * from './scoring.js';
export * from './geo.js';
export * from './assignment.js';
