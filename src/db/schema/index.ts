export { battleMemories } from './battle-memories.js';
export { decisionLogs } from './decision-logs.js';
