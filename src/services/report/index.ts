export * from './report-formatter.js';
