export * from './task.js';
export type * from './state.js';
