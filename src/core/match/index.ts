export * from './match.js';
export * from './process.js';
