// Export all checks

export * from './runtime-version-check.js';
export * from './artifact-presence-check.js';
export * from './probe-runtime-check.js';
export * from './probe-compilation-check.js';
export * from './privilege-check.js';
