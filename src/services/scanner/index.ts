export * from './utf8.js';
export * from './scanner.js';
