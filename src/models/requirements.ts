// Fixed requirements the agent places on the host

import { RequiredArtifact } from './types.js';

export const AGENT_ENTRY: RequiredArtifact = { name: 'detector.js', path: 'detector.js', role: 'agent-entry' };
export const PROBE_SOURCE: RequiredArtifact = { name: 'bpf.c', path: 'bpf.c', role: 'probe-source' };
export const PROBE_HEADER: RequiredArtifact = { name: 'bpf.h', path: 'bpf.h', role: 'probe-header' };

export const REQUIRED_ARTIFACTS: readonly RequiredArtifact[] = Object.freeze([
  AGENT_ENTRY,
  PROBE_SOURCE,
  PROBE_HEADER
]);

/**
 * Tables the loaded probe must expose: configuration input, two pattern
 * tables, per-process statistics and the event stream.
 */
export const REQUIRED_TABLES: readonly string[] = Object.freeze([
  'config',
  'patterns',
  'threshold_patterns',
  'pidstats',
  'events'
]);

/**
 * Always passed to the probe compiler
 */
export const BASE_CFLAGS: readonly string[] = Object.freeze(['-Wno-macro-redefined']);

/**
 * Everything the orchestrator checks against, injected at construction
 */
export interface PreflightRequirements {
  artifacts: readonly RequiredArtifact[];
  probeSource: RequiredArtifact;
  tables: readonly string[];
  cflags: readonly string[];
}

export const DEFAULT_REQUIREMENTS: PreflightRequirements = Object.freeze({
  artifacts: REQUIRED_ARTIFACTS,
  probeSource: PROBE_SOURCE,
  tables: REQUIRED_TABLES,
  cflags: BASE_CFLAGS
});
