export * from './preflight-orchestrator.js';
