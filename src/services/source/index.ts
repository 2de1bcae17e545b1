export * from './byte-source.js';
export * from './file-source.js';
export * from './buffer-source.js';
export * from './stream-source.js';
