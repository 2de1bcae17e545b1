// Export all services

export * from './scanner/index.js';
export * from './source/index.js';
export * from './validation/index.js';
export * from './report/index.js';
export * from './config/config-service.js';
