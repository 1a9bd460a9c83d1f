export * from './probe-runtime.js';
export * from './clang-runtime.js';
export * from './runtime-loader.js';
