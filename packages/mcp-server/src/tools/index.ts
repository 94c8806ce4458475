// packages/mcp-server/src/tools/index.ts — barrel export

export { handleAnalyze } from './analyze.js';
export { handleCleanup } from './cleanup.js';
export { handleMark } from './mark.js';
