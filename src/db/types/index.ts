export * from './enums.js';
export * from './battle-state.js';
