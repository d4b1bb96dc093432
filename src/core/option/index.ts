export * from './action.js';
export * from './declaration.js';
export * from './option.js';
export * from './option-set.js';
export * from './pos-index.js';
export * from './value-parser.js';
