export * from './style.js';
export * from './guess.js';
