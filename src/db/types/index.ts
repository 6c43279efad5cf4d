export * from './enums.js';
export * from './battle-snapshot.js';
export * from './damage-estimate.js';
export * from './action-candidate.js';
export * from './engine-memory.js';
export * from './filter-trace.js';
