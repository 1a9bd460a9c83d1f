// Export all domain models

export * from './types.js';
export * from './outcome.js';
export * from './requirements.js';
