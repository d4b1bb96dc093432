export * from './invoker.js';
