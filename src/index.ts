// Kiln — devcontainer project generator
export * from './core/index.js';
export * from './config/index.js';
export * from './templates/index.js';
export * from './files/index.js';
export * from './features/index.js';
export * from './plugins/index.js';
export * from './repository/index.js';
export * from './container/index.js';
export * from './generator/index.js';
export * from './diff/index.js';
export * from './doctor/index.js';
export * from './observability/index.js';
export * from './cli/index.js';
