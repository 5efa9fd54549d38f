export * from './value.js';
export * from './condition.js';
export * from './operator.js';
