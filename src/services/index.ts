// Export all services

export * from './checks/index.js';
export * from './config/config-service.js';
export * from './environment/host-environment.js';
export * from './orchestrator/index.js';
export * from './probe/index.js';
